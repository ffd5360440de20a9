import { useMemo, useRef, useState } from "react";
import { FileEdit, RotateCcw, Upload } from "lucide-react";
import { cn } from "@/lib/utils";
import { btn, field, sp, ty } from "@/lib/design-tokens";
import { fileStem } from "@/lib/output-names";
import { parseRulesDocument } from "@/lib/payload-json";
import { applyPayloadEdit } from "@/lib/payload-edits";
import type { PayloadEdit, PayloadEditKind } from "@/lib/payload-edits";
import { countRulesByParameter } from "@/lib/rules-payload";
import { VALUE_TYPES, isValueType } from "@/lib/typed-value";
import type { ValueType } from "@/lib/typed-value";
import type { RulesDocument } from "@/types";
import { RulesPreviewTable } from "@/components/rules/RulesPreviewTable";
import { DownloadJsonButton } from "@/components/rules/DownloadJsonButton";
import { NoticeList } from "@/components/rules/NoticeList";

interface LoadedDocument {
  fileName: string;
  document: RulesDocument;
}

const ACTIONS: { kind: PayloadEditKind; label: string }[] = [
  { kind: "specId", label: "spec_id" },
  { kind: "unit", label: "DDF_unit" },
  { kind: "key", label: "Any key" },
  { kind: "remove", label: "Remove parameters" },
];

interface EditForm {
  specId: string;
  unit: string;
  keyPath: string;
  value: string;
  valueType: ValueType;
  onlyMissing: boolean;
  parameterIds: string;
}

const EMPTY_FORM: EditForm = {
  specId: "",
  unit: "",
  keyPath: "",
  value: "",
  valueType: "auto",
  onlyMissing: false,
  parameterIds: "",
};

function toEdit(kind: PayloadEditKind, form: EditForm): PayloadEdit {
  switch (kind) {
    case "specId":
      return { kind, specId: form.specId };
    case "unit":
      return { kind, unit: form.unit, onlyMissing: form.onlyMissing, parameterIds: form.parameterIds };
    case "key":
      return {
        kind,
        keyPath: form.keyPath,
        value: form.value,
        valueType: form.valueType,
        onlyMissing: form.onlyMissing,
        parameterIds: form.parameterIds,
      };
    case "remove":
      return { kind, parameterIds: form.parameterIds };
  }
}

function ParameterSummary({ document }: { document: RulesDocument }) {
  const counts = useMemo(() => countRulesByParameter(document), [document]);
  return (
    <div className="flex flex-wrap gap-1">
      {counts.map(({ parametertypeId, count }) => (
        <span key={parametertypeId ?? "malformed"} className="rounded-md bg-muted px-2 py-0.5 font-mono text-xs">
          {parametertypeId ?? "?"} · {count}
        </span>
      ))}
    </div>
  );
}

export function PayloadEditorView() {
  const inputRef = useRef<HTMLInputElement>(null);
  const [loaded, setLoaded] = useState<LoadedDocument | null>(null);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [kind, setKind] = useState<PayloadEditKind>("specId");
  const [form, setForm] = useState<EditForm>(EMPTY_FORM);

  const onFile = (file: File) => {
    file
      .text()
      .then((text) => {
        setLoaded({ fileName: file.name, document: parseRulesDocument(text, file.name) });
        setLoadError(null);
      })
      .catch((err: unknown) => {
        setLoaded(null);
        setLoadError(err instanceof Error ? err.message : String(err));
      });
  };

  const result = useMemo(
    () => (loaded ? applyPayloadEdit(loaded.document, fileStem(loaded.fileName), toEdit(kind, form)) : null),
    [loaded, kind, form],
  );
  const set = <K extends keyof EditForm>(key: K, value: EditForm[K]) => setForm((prev) => ({ ...prev, [key]: value }));
  const usesFilter = kind === "unit" || kind === "key";

  return (
    <div className={cn("flex flex-1 flex-col gap-4", sp.mainContent)}>
      <div className="flex items-center gap-2">
        <FileEdit className="h-5 w-5 text-primary" />
        <h1 className={ty.pageTitle}>Payload editor</h1>
      </div>

      <div className="flex items-center gap-3">
        <input
          ref={inputRef}
          type="file"
          accept=".json,application/json"
          className="hidden"
          onChange={(e) => {
            const file = e.target.files?.[0];
            if (file) onFile(file);
            e.target.value = "";
          }}
        />
        <button type="button" className={cn(btn.secondary, "inline-flex items-center gap-1")} onClick={() => inputRef.current?.click()}>
          <Upload className="h-3 w-3" />
          Load rules JSON
        </button>
        {loaded && (
          <span className={ty.caption}>
            <span className={ty.monoSm}>{loaded.fileName}</span> · {loaded.document.rules.length} rules
          </span>
        )}
      </div>
      {loadError && <NoticeList tone="error" messages={[loadError]} />}

      {loaded && (
        <>
          <ParameterSummary document={loaded.document} />

          <div className="flex gap-1 border-b">
            {ACTIONS.map((action) => (
              <button
                key={action.kind}
                type="button"
                onClick={() => setKind(action.kind)}
                className={cn(
                  "border-b-2 px-3 py-1.5 text-xs font-medium",
                  kind === action.kind ? "border-primary text-foreground" : "border-transparent text-muted-foreground hover:text-foreground",
                )}
              >
                {action.label}
              </button>
            ))}
          </div>

          <div className="flex flex-wrap items-end gap-4">
            {kind === "specId" && (
              <label className={field.label}>
                New spec_id
                <input value={form.specId} onChange={(e) => set("specId", e.target.value)} className={cn(field.input, "w-28")} />
              </label>
            )}
            {kind === "unit" && (
              <label className={field.label}>
                New DDF_unit (blank or "null" clears)
                <input value={form.unit} onChange={(e) => set("unit", e.target.value)} className={cn(field.input, "w-36")} />
              </label>
            )}
            {kind === "key" && (
              <>
                <label className={field.label}>
                  Key path
                  <input
                    value={form.keyPath}
                    onChange={(e) => set("keyPath", e.target.value)}
                    placeholder="data.regex_filter"
                    className={cn(field.input, "w-48")}
                  />
                </label>
                <label className={field.label}>
                  Value
                  <input value={form.value} onChange={(e) => set("value", e.target.value)} className={cn(field.input, "w-40")} />
                </label>
                <label className={field.label}>
                  As
                  <select
                    value={form.valueType}
                    onChange={(e) => {
                      if (isValueType(e.target.value)) set("valueType", e.target.value);
                    }}
                    className={field.select}
                  >
                    {VALUE_TYPES.map((t) => (
                      <option key={t} value={t}>
                        {t}
                      </option>
                    ))}
                  </select>
                </label>
              </>
            )}
            {(usesFilter || kind === "remove") && (
              <label className={field.label}>
                {kind === "remove" ? "parametertype_ids to remove" : "Only parametertype_ids (optional)"}
                <input
                  value={form.parameterIds}
                  onChange={(e) => set("parameterIds", e.target.value)}
                  placeholder="5239, 5244"
                  className={cn(field.input, "w-48")}
                />
              </label>
            )}
            {usesFilter && (
              <label className="flex items-center gap-1.5 text-xs text-muted-foreground">
                <input type="checkbox" checked={form.onlyMissing} onChange={(e) => set("onlyMissing", e.target.checked)} />
                Only where missing
              </label>
            )}
          </div>

          {result && !result.ok && <NoticeList tone="error" messages={[result.error]} />}
          {result && result.ok && (
            <>
              <NoticeList
                tone={result.changed === 0 ? "warning" : "info"}
                messages={[result.changed === 0 ? `${result.summary}; the output equals the input` : result.summary]}
              />
              <div className="flex items-center gap-3">
                <DownloadJsonButton payload={result.document} fileName={result.outputName} />
                <button
                  type="button"
                  className={cn(btn.secondary, "inline-flex items-center gap-1")}
                  onClick={() => {
                    setLoaded({ fileName: result.outputName, document: result.document });
                    setForm(EMPTY_FORM);
                  }}
                  title="Continue editing from this result"
                >
                  <RotateCcw className="h-3 w-3" />
                  Use as input
                </button>
                <span className={ty.monoSm}>{result.outputName}</span>
              </div>
            </>
          )}

          <div className="min-h-[240px] flex-1">
            <RulesPreviewTable items={result && result.ok ? result.document.rules : loaded.document.rules} />
          </div>
        </>
      )}
    </div>
  );
}
