import { Download } from "lucide-react";
import { cn } from "@/lib/utils";
import { btn } from "@/lib/design-tokens";
import { serializePayload } from "@/lib/payload-json";
import type { JsonValue } from "@/types";

interface DownloadJsonButtonProps {
  payload: JsonValue | null;
  fileName: string;
  label?: string;
}

function saveText(text: string, fileName: string): void {
  const url = URL.createObjectURL(new Blob([text], { type: "application/json" }));
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}

export function DownloadJsonButton({ payload, fileName, label = "Download" }: DownloadJsonButtonProps) {
  const disabled = payload === null;
  return (
    <button
      type="button"
      disabled={disabled}
      onClick={() => {
        if (payload !== null) saveText(serializePayload(payload), fileName);
      }}
      className={cn(btn.primary, "inline-flex items-center gap-1.5", disabled && btn.disabled)}
      title={disabled ? undefined : fileName}
    >
      <Download className="h-3 w-3" />
      {label}
    </button>
  );
}
