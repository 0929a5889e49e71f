import type { ReactNode } from "react";
import { BarChart3 } from "lucide-react";

export const SiteShell = ({ children }: { children: ReactNode }) => (
  <div className="min-h-screen bg-background text-foreground">
    <header className="border-b border-border/60 bg-card/60">
      <div className="container mx-auto flex items-center gap-3 px-4 py-4">
        <BarChart3 className="h-7 w-7 text-primary" />
        <div>
          <h1 className="text-2xl font-bold text-primary sm:text-3xl">CORD-19 COVID-19 Research Explorer</h1>
          <p className="text-xs text-muted-foreground sm:text-sm">
            Explore metadata from COVID-19 research papers (2019-2023)
          </p>
        </div>
      </div>
    </header>
    {children}
  </div>
);
