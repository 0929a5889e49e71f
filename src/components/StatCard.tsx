import type { ReactNode } from "react";
import type { LucideIcon } from "lucide-react";
import { Card, CardContent } from "@/components/ui/card";
import { cn } from "@/lib/utils";

interface StatCardProps {
  title: string;
  value: ReactNode;
  icon?: LucideIcon;
  hint?: string;
  valueClassName?: string;
}

export const StatCard = ({ title, value, icon: Icon, hint, valueClassName }: StatCardProps) => (
  <Card role="group" aria-label={title} className="border-border/60 bg-muted/40">
    <CardContent className="flex flex-col items-center gap-1 p-4 text-center">
      <div className="flex items-center gap-1.5 text-xs text-muted-foreground">
        {Icon && <Icon className="h-3.5 w-3.5 text-primary" />}
        <span>{title}</span>
      </div>
      <div className={cn("text-2xl font-semibold text-foreground", valueClassName)} title={hint}>
        {value}
      </div>
    </CardContent>
  </Card>
);
