import { useState, useEffect } from "react";
import type { Dispatch, SetStateAction } from "react";

/**
 * Custom event name used to synchronize useSessionState hooks sharing
 * the same key across different components in the same tab.
 */
const SESSION_STATE_EVENT = "rules-toolbox:session-state";

/** Prefix for every key this app writes to sessionStorage. */
export const SESSION_KEY_PREFIX = "rules-toolbox.";

function isSessionStateEvent(e: Event): e is CustomEvent<{ key: string }> {
  return e instanceof CustomEvent && typeof e.detail?.key === "string";
}

function readStored<T>(key: string, parse: (raw: unknown) => T | null): T | null {
  try {
    const stored = sessionStorage.getItem(key);
    if (stored === null) return null;
    const parsed: unknown = JSON.parse(stored);
    return parse(parsed);
  } catch {
    return null;
  }
}

/**
 * Drop-in replacement for useState that persists to sessionStorage.
 * Survives view switches within a browser session; resets on new tab.
 *
 * Stored values are untrusted: `parse` turns the decoded JSON back into a
 * `T`, or returns null to fall back to `defaultValue`.
 *
 * Cross-component sync: when one component writes a new value, all other
 * mounted hooks sharing the same key receive the update via a custom DOM
 * event.
 */
export function useSessionState<T>(
  key: string,
  defaultValue: T,
  parse: (raw: unknown) => T | null,
): [T, Dispatch<SetStateAction<T>>] {
  const storageKey = SESSION_KEY_PREFIX + key;
  const [state, setState] = useState<T>(() => readStored(storageKey, parse) ?? defaultValue);

  // Persist to sessionStorage and notify other hooks with the same key
  useEffect(() => {
    try {
      const newVal = JSON.stringify(state);
      const oldVal = sessionStorage.getItem(storageKey);
      sessionStorage.setItem(storageKey, newVal);
      if (oldVal !== newVal) {
        window.dispatchEvent(
          new CustomEvent(SESSION_STATE_EVENT, { detail: { key: storageKey } }),
        );
      }
    } catch (err) {
      // storage full or unavailable; state still lives in memory
      console.warn(`Could not persist ${storageKey}`, err);
    }
  }, [storageKey, state]);

  // Listen for writes from other hooks sharing the same key
  useEffect(() => {
    const handler = (e: Event) => {
      if (!isSessionStateEvent(e) || e.detail.key !== storageKey) return;
      const next = readStored(storageKey, parse);
      if (next === null) return;
      setState((prev) => (JSON.stringify(prev) === JSON.stringify(next) ? prev : next));
    };
    window.addEventListener(SESSION_STATE_EVENT, handler);
    return () => window.removeEventListener(SESSION_STATE_EVENT, handler);
  }, [storageKey, parse]);

  return [state, setState];
}

// ─── Parsers ───────────────────────────────────────────────

export function parseStoredString(raw: unknown): string | null {
  return typeof raw === "string" ? raw : null;
}

export function parseStoredStringRecord(raw: unknown): Record<string, string> | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return null;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}
