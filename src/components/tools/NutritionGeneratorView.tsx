import { useMemo } from "react";
import { Lock, Salad } from "lucide-react";
import { cn } from "@/lib/utils";
import { btn, field, sp, ty } from "@/lib/design-tokens";
import {
  NUTRITION_PARAMETERS,
  NUTRITION_UNIT_OPTIONS,
  buildNutritionRules,
  effectiveUnit,
  needsDeviationPercent,
} from "@/lib/nutrition-catalog";
import type { NutritionInput } from "@/lib/nutrition-catalog";
import { generatedRulesFileName } from "@/lib/output-names";
import { parseSpecId } from "@/lib/generator-form";
import { LOCKED_UNIT } from "@/lib/rule-constants";
import { parseStoredString, parseStoredStringRecord, useSessionState } from "@/hooks/useSessionState";
import { RulesPreviewTable } from "@/components/rules/RulesPreviewTable";
import { DownloadJsonButton } from "@/components/rules/DownloadJsonButton";
import { NoticeList } from "@/components/rules/NoticeList";

type CellKey = "target" | "unit" | "deviationPercent";
type FormCells = Record<string, string>;

const EMPTY_CELLS: FormCells = {};

const cellId = (parametertypeId: number, key: CellKey) => `${parametertypeId}.${key}`;

export function NutritionGeneratorView() {
  const [specIdText, setSpecIdText] = useSessionState("nutrition.specId", "", parseStoredString);
  const [cells, setCells] = useSessionState("nutrition.cells", EMPTY_CELLS, parseStoredStringRecord);

  const read = (id: number, key: CellKey) => cells[cellId(id, key)] ?? "";
  const write = (id: number, key: CellKey, value: string) =>
    setCells((prev) => ({ ...prev, [cellId(id, key)]: value }));

  const specId = parseSpecId(specIdText);
  const result = useMemo(() => {
    if (specId === null) return null;
    const inputs: Record<number, NutritionInput> = {};
    for (const param of NUTRITION_PARAMETERS) {
      const id = param.parametertypeId;
      inputs[id] = {
        target: cells[cellId(id, "target")] ?? "",
        unit: cells[cellId(id, "unit")] ?? null,
        deviationPercent: cells[cellId(id, "deviationPercent")] ?? "",
      };
    }
    return buildNutritionRules({ specId, inputs });
  }, [specId, cells]);

  const fileName = specId !== null ? generatedRulesFileName("Nutrition_Rules", specId, new Date()) : "";
  const downloadable = result !== null && result.errors.length === 0 ? result.payload : null;

  return (
    <div className={cn("flex flex-1 flex-col gap-4", sp.mainContent)}>
      <div className="flex items-center gap-2">
        <Salad className="h-5 w-5 text-primary" />
        <h1 className={ty.pageTitle}>Nutrition rules</h1>
      </div>

      <div className="flex flex-wrap items-end gap-4">
        <label className={field.label}>
          spec_id
          <input
            value={specIdText}
            onChange={(e) => setSpecIdText(e.target.value)}
            placeholder="1029"
            className={cn(field.input, "w-28", specIdText !== "" && specId === null && field.invalid)}
          />
        </label>
        <button type="button" className={btn.secondary} onClick={() => setCells(EMPTY_CELLS)}>
          Clear table
        </button>
        <p className={cn(ty.caption, "max-w-md")}>
          Parameters left blank emit one placeholder rule each. Locked parameters always use {LOCKED_UNIT}.
        </p>
      </div>

      <table className="w-fit text-xs">
        <thead>
          <tr className={cn("border-b", ty.tableHeader)}>
            <th className={cn(sp.headerCompact, "text-left")}>Parameter</th>
            <th className={cn(sp.headerCompact, "text-left")}>ID</th>
            <th className={cn(sp.headerCompact, "text-left")}>Target</th>
            <th className={cn(sp.headerCompact, "text-left")}>Unit</th>
            <th className={cn(sp.headerCompact, "text-left")}>Deviation %</th>
          </tr>
        </thead>
        <tbody>
          {NUTRITION_PARAMETERS.map((param) => {
            const id = param.parametertypeId;
            const unit = read(id, "unit");
            const showPercent = needsDeviationPercent(param, unit);
            return (
              <tr key={id} className="border-b">
                <td className={cn(sp.cellCompact, "font-medium")}>{param.name}</td>
                <td className={cn(sp.cellCompact, ty.mono, "text-muted-foreground")}>{id}</td>
                <td className={sp.cellCompact}>
                  <input
                    value={read(id, "target")}
                    onChange={(e) => write(id, "target", e.target.value)}
                    className={cn(field.input, "w-24")}
                  />
                </td>
                <td className={sp.cellCompact}>
                  {param.group === "locked" ? (
                    <span className="inline-flex items-center gap-1 text-muted-foreground">
                      <Lock className="h-3 w-3" />
                      {LOCKED_UNIT}
                    </span>
                  ) : (
                    <select
                      value={effectiveUnit(param, unit) ?? ""}
                      onChange={(e) => write(id, "unit", e.target.value)}
                      className={cn(field.select, "w-28")}
                    >
                      <option value="">(none)</option>
                      {NUTRITION_UNIT_OPTIONS.map((option) => (
                        <option key={option} value={option}>
                          {option}
                        </option>
                      ))}
                    </select>
                  )}
                </td>
                <td className={sp.cellCompact}>
                  {showPercent ? (
                    <input
                      value={read(id, "deviationPercent")}
                      onChange={(e) => write(id, "deviationPercent", e.target.value)}
                      placeholder="10"
                      className={cn(field.input, "w-16")}
                    />
                  ) : (
                    <span className={ty.caption}>policy</span>
                  )}
                </td>
              </tr>
            );
          })}
        </tbody>
      </table>

      {result && (
        <>
          <NoticeList tone="error" messages={result.errors} />
          <NoticeList tone="warning" messages={result.warnings} />
          <NoticeList tone="info" messages={result.notes} />
        </>
      )}

      <div className="flex items-center gap-3">
        <DownloadJsonButton payload={downloadable} fileName={fileName} />
        {downloadable && <span className={ty.monoSm}>{fileName}</span>}
      </div>

      <div className="min-h-[240px]">
        <RulesPreviewTable items={result ? result.payload.rules : []} />
      </div>
    </div>
  );
}
