import { NavLink, Outlet, useLocation } from "react-router-dom";
import { Calculator, FileEdit, Home, Salad, Wand2 } from "lucide-react";
import type { LucideIcon } from "lucide-react";
import { cn } from "@/lib/utils";
import { Header } from "./Header";

interface NavItem {
  to: string;
  label: string;
  icon: LucideIcon;
}

export const TOOL_NAV: readonly NavItem[] = [
  { to: "/generate", label: "Rule generator", icon: Wand2 },
  { to: "/nutrition", label: "Nutrition rules", icon: Salad },
  { to: "/edit", label: "Payload editor", icon: FileEdit },
  { to: "/ranges", label: "Range calculator", icon: Calculator },
];

function SidebarLink({ to, label, icon: Icon }: NavItem) {
  return (
    <NavLink
      to={to}
      end
      title={label}
      className={({ isActive }) =>
        cn(
          "flex h-7 w-7 items-center justify-center rounded",
          isActive ? "bg-white/20 text-white" : "text-white/70 hover:bg-white/15 hover:text-white/90",
        )
      }
    >
      <Icon className="h-4 w-4" />
    </NavLink>
  );
}

export function Layout() {
  const location = useLocation();
  const current = TOOL_NAV.find((item) => item.to === location.pathname);

  return (
    <div className="flex h-screen flex-col">
      <Header />
      <div className="flex min-h-0 flex-1">
        {/* Icon sidebar spans full height below header */}
        <nav
          className="flex shrink-0 flex-col items-center gap-1 py-2"
          style={{ width: 36, background: "#1a3a5c" }}
        >
          <SidebarLink to="/" label="Home" icon={Home} />
          {TOOL_NAV.map((item) => (
            <SidebarLink key={item.to} {...item} />
          ))}
        </nav>
        <main className="flex min-w-0 flex-1 flex-col overflow-auto">
          <Outlet />
        </main>
      </div>
      {/* Status bar */}
      <div
        className="flex h-6 shrink-0 items-center border-t px-3 text-[10px] text-muted-foreground"
        style={{ background: "#f5f4f2" }}
      >
        {current ? current.label : "Ready"}
      </div>
    </div>
  );
}
