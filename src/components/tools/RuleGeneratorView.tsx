import { useCallback, useMemo } from "react";
import { Plus, Trash2, Wand2 } from "lucide-react";
import { cn } from "@/lib/utils";
import { btn, field, sp, ty } from "@/lib/design-tokens";
import { MODE_LABELS, MODE_NAMES, RULES_PER_MODE, isModeName, modeNeedsTarget } from "@/lib/band-modes";
import { EMPTY_PARAM_ROW, evaluateGeneratorForm } from "@/lib/generator-form";
import { generatedRulesFileName } from "@/lib/output-names";
import type { ParamInputFields } from "@/lib/param-input";
import { parseStoredString, useSessionState } from "@/hooks/useSessionState";
import { RulesPreviewTable } from "@/components/rules/RulesPreviewTable";
import { DownloadJsonButton } from "@/components/rules/DownloadJsonButton";
import { NoticeList } from "@/components/rules/NoticeList";

function parseStoredRows(raw: unknown): ParamInputFields[] | null {
  if (!Array.isArray(raw)) return null;
  const rows: ParamInputFields[] = [];
  for (const entry of raw) {
    if (typeof entry !== "object" || entry === null) return null;
    const text = (key: string): string => {
      const value: unknown = Reflect.get(entry, key);
      return typeof value === "string" ? value : "";
    };
    rows.push({
      parametertypeId: text("parametertypeId"),
      target: text("target"),
      unit: text("unit"),
      mode: text("mode") || EMPTY_PARAM_ROW.mode,
      deviationPercent: text("deviationPercent"),
      upper: text("upper"),
    });
  }
  return rows;
}

function ParamRow({
  row,
  index,
  onChange,
  onRemove,
}: {
  row: ParamInputFields;
  index: number;
  onChange: (index: number, patch: Partial<ParamInputFields>) => void;
  onRemove: (index: number) => void;
}) {
  const mode = isModeName(row.mode) ? row.mode : null;
  const needsTarget = mode === null || modeNeedsTarget(mode);
  const input = (key: keyof ParamInputFields, placeholder: string, enabled = true, width = "w-24") => (
    <input
      value={row[key] ?? ""}
      onChange={(e) => {
        const patch: Partial<ParamInputFields> = {};
        patch[key] = e.target.value;
        onChange(index, patch);
      }}
      placeholder={placeholder}
      disabled={!enabled}
      className={cn(field.input, width, !enabled && btn.disabled)}
    />
  );

  return (
    <tr className="border-b">
      <td className={cn(sp.cellCompact, ty.caption)}>{index + 1}</td>
      <td className={sp.cellCompact}>{input("parametertypeId", "5587")}</td>
      <td className={sp.cellCompact}>{input("target", "12,5", needsTarget)}</td>
      <td className={sp.cellCompact}>{input("unit", "mg/100g", needsTarget)}</td>
      <td className={sp.cellCompact}>
        <select
          value={row.mode}
          onChange={(e) => onChange(index, { mode: e.target.value })}
          className={cn(field.select, "w-52")}
        >
          {MODE_NAMES.map((name) => (
            <option key={name} value={name}>
              {MODE_LABELS[name]} · {RULES_PER_MODE[name]} rules
            </option>
          ))}
        </select>
      </td>
      <td className={sp.cellCompact}>{input("deviationPercent", "10", row.mode === "deviation", "w-16")}</td>
      <td className={sp.cellCompact}>{input("upper", "0,5", row.mode === "range", "w-20")}</td>
      <td className={sp.cellCompact}>
        <button type="button" className={btn.ghost} onClick={() => onRemove(index)} title="Remove row">
          <Trash2 className="h-3.5 w-3.5" />
        </button>
      </td>
    </tr>
  );
}

export function RuleGeneratorView() {
  const [specId, setSpecId] = useSessionState("generate.specId", "", parseStoredString);
  const [prefix, setPrefix] = useSessionState("generate.prefix", "Rules", parseStoredString);
  const [qualEn, setQualEn] = useSessionState("generate.qualEn", "", parseStoredString);
  const [qualDe, setQualDe] = useSessionState("generate.qualDe", "", parseStoredString);
  const [rows, setRows] = useSessionState<ParamInputFields[]>("generate.rows", [EMPTY_PARAM_ROW], parseStoredRows);

  const result = useMemo(
    () => evaluateGeneratorForm({ specId, rows, qualitative: { en: qualEn, de: qualDe } }),
    [specId, rows, qualEn, qualDe],
  );
  const usesQualitative = rows.some((row) => row.mode === "qualitative");

  const updateRow = useCallback(
    (index: number, patch: Partial<ParamInputFields>) =>
      setRows((prev) => prev.map((row, i) => (i === index ? { ...row, ...patch } : row))),
    [setRows],
  );
  const removeRow = useCallback(
    (index: number) => setRows((prev) => prev.filter((_, i) => i !== index)),
    [setRows],
  );

  const fileName = result.ok ? generatedRulesFileName(prefix.trim() || "Rules", result.specId, new Date()) : "";

  return (
    <div className={cn("flex flex-1 flex-col gap-4", sp.mainContent)}>
      <div className="flex items-center gap-2">
        <Wand2 className="h-5 w-5 text-primary" />
        <h1 className={ty.pageTitle}>Rule generator</h1>
      </div>

      <div className="flex flex-wrap items-end gap-4">
        <label className={field.label}>
          spec_id
          <input value={specId} onChange={(e) => setSpecId(e.target.value)} placeholder="1029" className={cn(field.input, "w-28")} />
        </label>
        <label className={field.label}>
          File prefix
          <input value={prefix} onChange={(e) => setPrefix(e.target.value)} className={cn(field.input, "w-28")} />
        </label>
        {usesQualitative && (
          <>
            <label className={field.label}>
              Qualitative text (EN)
              <input value={qualEn} onChange={(e) => setQualEn(e.target.value)} placeholder="detected" className={cn(field.input, "w-44")} />
            </label>
            <label className={field.label}>
              Qualitative text (DE)
              <input value={qualDe} onChange={(e) => setQualDe(e.target.value)} placeholder="nachweisbar" className={cn(field.input, "w-44")} />
            </label>
          </>
        )}
      </div>

      <section>
        <div className="mb-1 flex items-center justify-between">
          <h2 className={ty.sectionHeaderUpper}>Parameters</h2>
          <button
            type="button"
            className={cn(btn.secondary, "inline-flex items-center gap-1")}
            onClick={() => setRows((prev) => [...prev, EMPTY_PARAM_ROW])}
          >
            <Plus className="h-3 w-3" />
            Add row
          </button>
        </div>
        <table className="text-xs">
          <thead>
            <tr className={cn("border-b", ty.tableHeader)}>
              <th className={cn(sp.headerCompact, "text-left")}>#</th>
              <th className={cn(sp.headerCompact, "text-left")}>parametertype_id</th>
              <th className={cn(sp.headerCompact, "text-left")}>Target</th>
              <th className={cn(sp.headerCompact, "text-left")}>Unit</th>
              <th className={cn(sp.headerCompact, "text-left")}>Mode</th>
              <th className={cn(sp.headerCompact, "text-left")}>Dev %</th>
              <th className={cn(sp.headerCompact, "text-left")}>Upper</th>
              <th />
            </tr>
          </thead>
          <tbody>
            {rows.map((row, index) => (
              <ParamRow key={index} row={row} index={index} onChange={updateRow} onRemove={removeRow} />
            ))}
          </tbody>
        </table>
      </section>

      {result.ok ? (
        <>
          <NoticeList tone="warning" messages={result.warnings} />
          <NoticeList tone="info" messages={result.notes} />
        </>
      ) : (
        <NoticeList tone="error" messages={result.errors} />
      )}

      <div className="flex items-center gap-3">
        <DownloadJsonButton payload={result.ok ? result.payload : null} fileName={fileName} />
        {result.ok && <span className={ty.monoSm}>{fileName}</span>}
      </div>

      <div className="min-h-[240px] flex-1">
        <RulesPreviewTable items={result.ok ? result.payload.rules : []} />
      </div>
    </div>
  );
}
