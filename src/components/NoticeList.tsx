import { AlertTriangle, CheckCircle2, Info, XCircle } from "lucide-react";
import type { Notice, NoticeLevel } from "@/lib/papers";

const tone: Record<NoticeLevel, string> = {
  info: "border-sky-200 bg-sky-50 text-sky-800",
  success: "border-emerald-200 bg-emerald-50 text-emerald-800",
  warning: "border-amber-200 bg-amber-50 text-amber-800",
  error: "border-l-4 border-rose-500 bg-rose-50 text-rose-800",
};

const icons = {
  info: Info,
  success: CheckCircle2,
  warning: AlertTriangle,
  error: XCircle,
} satisfies Record<NoticeLevel, unknown>;

export const NoticeList = ({ notices }: { notices: Notice[] }) => {
  if (!notices.length) return null;
  return (
    <ul className="space-y-2" aria-label="Data loading messages">
      {notices.map((notice, index) => {
        const Icon = icons[notice.level];
        return (
          <li
            key={`${notice.level}-${index}`}
            role={notice.level === "error" ? "alert" : "status"}
            className={`flex items-start gap-2 rounded-md border px-3 py-2 text-sm ${tone[notice.level]}`}
          >
            <Icon className="mt-0.5 h-4 w-4 shrink-0" />
            <span>{notice.message}</span>
          </li>
        );
      })}
    </ul>
  );
};
