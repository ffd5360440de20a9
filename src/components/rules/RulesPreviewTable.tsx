import { useMemo, useState } from "react";
import {
  flexRender,
  getCoreRowModel,
  getSortedRowModel,
  useReactTable,
  type ColumnDef,
  type SortingState,
} from "@tanstack/react-table";
import { cn } from "@/lib/utils";
import { getDdfTypeBadgeClasses, getRuleColorDot } from "@/lib/rule-severity";
import { toPreviewRows, type PreviewRow } from "@/lib/rules-preview";
import { tbl, ty } from "@/lib/design-tokens";
import type { JsonValue } from "@/types";

interface RulesPreviewTableProps {
  items: readonly JsonValue[];
  /** Caps the rendered rows; the header still shows the full count. */
  maxRows?: number;
}

function Muted() {
  return <span className="text-muted-foreground">--</span>;
}

const COLUMNS: ColumnDef<PreviewRow>[] = [
  { accessorKey: "index", header: "#", size: 36 },
  { accessorKey: "parametertypeId", header: "Parameter", size: 80 },
  { accessorKey: "specId", header: "Spec", size: 60 },
  {
    accessorKey: "ddfType",
    header: "DDF type",
    size: 80,
    cell: ({ row }) =>
      row.original.ddfType ? (
        <span className={cn("inline-block rounded-sm px-1.5 py-0.5 text-[10px] font-semibold", getDdfTypeBadgeClasses(row.original.ddfType))}>
          {row.original.ddfType}
        </span>
      ) : (
        <Muted />
      ),
  },
  {
    accessorKey: "color",
    header: "Color",
    size: 70,
    cell: ({ row }) => (
      <span className="inline-flex items-center gap-1.5">
        <span className="h-2 w-2 rounded-full" style={{ background: getRuleColorDot(row.original.color) }} />
        {row.original.color || <Muted />}
      </span>
    ),
  },
  {
    accessorKey: "condition",
    header: "Condition",
    size: 200,
    cell: ({ row }) => <span className={ty.mono}>{row.original.condition || "--"}</span>,
  },
  {
    accessorKey: "target",
    header: "Target",
    size: 70,
    cell: ({ row }) => (row.original.target ? <span className={ty.mono}>{row.original.target}</span> : <Muted />),
  },
  {
    accessorKey: "unit",
    header: "Unit",
    size: 70,
    cell: ({ row }) => row.original.unit || <Muted />,
  },
];

export function RulesPreviewTable({ items, maxRows = 500 }: RulesPreviewTableProps) {
  const [sorting, setSorting] = useState<SortingState>([]);
  const rows = useMemo(() => toPreviewRows(items.slice(0, maxRows)), [items, maxRows]);

  const table = useReactTable({
    data: rows,
    columns: COLUMNS,
    state: { sorting },
    onSortingChange: setSorting,
    getCoreRowModel: getCoreRowModel(),
    getSortedRowModel: getSortedRowModel(),
  });

  return (
    <div className={cn("flex h-full flex-col", tbl.wrapper)}>
      <div className="flex shrink-0 items-center justify-between border-b bg-muted/30 px-3 py-1.5">
        <span className={ty.caption}>
          {items.length > rows.length ? `${rows.length} of ${items.length} rules` : `${items.length} rules`}
        </span>
      </div>
      <div className="min-h-0 flex-1 overflow-auto">
        <table className="w-full text-[10px]">
          <thead className="sticky top-0 z-10 bg-background">
            {table.getHeaderGroups().map((headerGroup) => (
              <tr key={headerGroup.id} className={tbl.headerRowCompact}>
                {headerGroup.headers.map((header) => {
                  const sorted = header.column.getIsSorted();
                  return (
                    <th
                      key={header.id}
                      className="cursor-pointer px-1.5 py-1 text-left align-middle font-semibold uppercase tracking-wider whitespace-nowrap text-muted-foreground hover:bg-accent/50"
                      style={{ width: header.getSize() }}
                      onClick={header.column.getToggleSortingHandler()}
                    >
                      {flexRender(header.column.columnDef.header, header.getContext())}
                      {sorted === "asc" ? " ↑" : sorted === "desc" ? " ↓" : ""}
                    </th>
                  );
                })}
              </tr>
            ))}
          </thead>
          <tbody>
            {table.getRowModel().rows.length ? (
              table.getRowModel().rows.map((row) => (
                <tr key={row.id} className={cn(tbl.rowDivider, "transition-colors hover:bg-accent/50")}>
                  {row.getVisibleCells().map((cell) => (
                    <td key={cell.id} className="px-1.5 py-px align-middle whitespace-nowrap">
                      {flexRender(cell.column.columnDef.cell, cell.getContext())}
                    </td>
                  ))}
                </tr>
              ))
            ) : (
              <tr>
                <td colSpan={COLUMNS.length} className="h-24 text-center text-muted-foreground">
                  No rules.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
}
