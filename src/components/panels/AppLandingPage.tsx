import { Link } from "react-router-dom";
import { ChevronRight, Terminal } from "lucide-react";
import { TOOL_NAV } from "@/components/layout/Layout";
import { sp, ty } from "@/lib/design-tokens";
import { cn } from "@/lib/utils";

const TOOL_DESCRIPTIONS: Record<string, string> = {
  "/generate": "Build perfect / OK / not OK band rules for one or more parameters and download the LIMS import JSON.",
  "/nutrition": "Fill target values for the nutrition parameter table; units and deviation policies are applied per parameter.",
  "/edit": "Load a rules JSON and change spec_id, DDF_unit or any other key, or remove parameters.",
  "/ranges": "Show the band edges a target produces before generating rules.",
};

export function AppLandingPage() {
  return (
    <div className="flex-1">
      <div className={cn("border-b", sp.landingHero)}>
        <h1 className={ty.pageTitle}>LIMS Rules Toolbox</h1>
        <p className="mt-1 max-w-2xl text-sm text-muted-foreground">
          Generates and edits the rule, spec and template payloads the LIMS imports. Every tool here runs
          the same engine as the command line.
        </p>
      </div>

      <div className="grid max-w-4xl grid-cols-1 gap-3 px-8 py-6 md:grid-cols-2">
        {TOOL_NAV.map(({ to, label, icon: Icon }) => (
          <Link
            key={to}
            to={to}
            className="group flex items-start gap-3 rounded-md border p-4 transition-colors hover:bg-accent/50"
          >
            <Icon className="mt-0.5 h-5 w-5 shrink-0 text-primary" />
            <div className="min-w-0 flex-1">
              <div className="flex items-center gap-1 text-sm font-semibold">
                {label}
                <ChevronRight className="h-3.5 w-3.5 text-muted-foreground opacity-0 transition-opacity group-hover:opacity-100" />
              </div>
              <p className={cn(ty.caption, "mt-1")}>{TOOL_DESCRIPTIONS[to]}</p>
            </div>
          </Link>
        ))}
      </div>

      <div className="flex items-center gap-2 px-8 pb-6 text-xs text-muted-foreground">
        <Terminal className="h-3.5 w-3.5" />
        CSV conversion, export and template filling are available on the command line:
        <code className={ty.monoSm}>npm run cli -- help</code>
      </div>
    </div>
  );
}
