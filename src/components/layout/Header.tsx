import { ListChecks } from "lucide-react";
import { Link } from "react-router-dom";

export function Header() {
  return (
    <header className="border-b bg-card">
      <div className="flex h-14 items-center justify-between px-6">
        <Link to="/" className="flex items-center gap-2 font-semibold">
          <ListChecks className="h-5 w-5" />
          LIMS Rules Toolbox
        </Link>
        <span className="text-xs text-muted-foreground">Rules, specs and template payloads</span>
      </div>
    </header>
  );
}
