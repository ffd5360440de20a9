import { AlertCircle, Info, TriangleAlert } from "lucide-react";
import { notice, type NoticeTone } from "@/lib/design-tokens";

const ICONS: Record<NoticeTone, typeof Info> = {
  error: AlertCircle,
  warning: TriangleAlert,
  info: Info,
};

export function NoticeList({ tone, messages }: { tone: NoticeTone; messages: readonly string[] }) {
  if (messages.length === 0) return null;
  const Icon = ICONS[tone];
  return (
    <ul className={notice[tone]}>
      {messages.map((message, i) => (
        <li key={i} className="flex items-start gap-1.5 py-0.5">
          <Icon className="mt-px h-3 w-3 shrink-0" />
          <span>{message}</span>
        </li>
      ))}
    </ul>
  );
}
