import { useMemo, useState } from "react";
import { Calculator } from "lucide-react";
import { cn } from "@/lib/utils";
import { field, sp, ty } from "@/lib/design-tokens";
import { parseLocaleNumber } from "@/lib/locale-number";
import { RANGE_TYPES, describeRanges, isRangeType } from "@/lib/range-calculator";
import type { RangeType } from "@/lib/range-calculator";
import { NoticeList } from "@/components/rules/NoticeList";

type RangeOutcome = { lines: string[] } | { error: string } | null;

function computeRanges(text: string, type: RangeType): RangeOutcome {
  const parsed = parseLocaleNumber(text);
  if (parsed.error) return { error: parsed.error };
  if (parsed.value === null) return null;
  if (parsed.value < 0) return { error: "Target value must not be negative." };
  return { lines: describeRanges(parsed.value, type) };
}

export function RangeCalculatorView() {
  const [target, setTarget] = useState("");
  const [type, setType] = useState<RangeType>("active");
  const outcome = useMemo(() => computeRanges(target, type), [target, type]);

  return (
    <div className={cn("flex flex-1 flex-col gap-4", sp.mainContent)}>
      <div className="flex items-center gap-2">
        <Calculator className="h-5 w-5 text-primary" />
        <h1 className={ty.pageTitle}>Range calculator</h1>
      </div>

      <div className="flex items-end gap-4">
        <label className={field.label}>
          Target value
          <input value={target} onChange={(e) => setTarget(e.target.value)} placeholder="12,5" className={cn(field.input, "w-28")} />
        </label>
        <label className={field.label}>
          Type
          <select
            value={type}
            onChange={(e) => {
              if (isRangeType(e.target.value)) setType(e.target.value);
            }}
            className={field.select}
          >
            {RANGE_TYPES.map((t) => (
              <option key={t} value={t}>
                {t}
              </option>
            ))}
          </select>
        </label>
      </div>

      {outcome && "error" in outcome && <NoticeList tone="error" messages={[outcome.error]} />}
      {outcome && "lines" in outcome && (
        <pre className={cn("w-fit rounded-md border bg-muted/30", sp.card, ty.monoSm)}>{outcome.lines.join("\n")}</pre>
      )}
    </div>
  );
}
