import { AlignLeft, BookOpen, FileText, Type } from "lucide-react";
import { StatCard } from "@/components/StatCard";
import { formatAverage, formatMetric, type PaperSummary } from "@/lib/metrics";

export const MetricsGrid = ({ summary }: { summary: PaperSummary }) => (
  <div className="grid grid-cols-2 gap-3 lg:grid-cols-4">
    <StatCard title="Total Papers" icon={FileText} value={formatMetric(summary.totalPapers)} />
    <StatCard title="Unique Journals" icon={BookOpen} value={formatMetric(summary.uniqueJournals)} />
    <StatCard
      title="Avg Title Words"
      icon={Type}
      value={formatAverage(summary.avgTitleWords)}
      hint={summary.avgTitleWords == null ? "No papers match the current filters" : undefined}
    />
    <StatCard
      title="Avg Abstract Words"
      icon={AlignLeft}
      value={formatAverage(summary.avgAbstractWords)}
      hint={summary.avgAbstractWords == null ? "No papers match the current filters" : undefined}
    />
  </div>
);
