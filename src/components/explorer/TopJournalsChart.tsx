import { useMemo } from "react";
import { journalChartLayout, journalChartTraces, plotConfig, topJournals } from "@/lib/charts";
import type { PaperDataset } from "@/lib/papers";
import { Plot } from "@/lib/plotly";

export const TopJournalsChart = ({ dataset, limit }: { dataset: PaperDataset; limit: number }) => {
  const rows = useMemo(() => topJournals(dataset, limit), [dataset, limit]);

  if (!rows.length) {
    return <p className="text-sm text-muted-foreground">No journal data available for current filters</p>;
  }

  return (
    <div className="h-[420px] w-full">
      <Plot
        data={journalChartTraces(rows)}
        layout={journalChartLayout}
        config={plotConfig}
        useResizeHandler
        style={{ width: "100%", height: "100%" }}
      />
    </div>
  );
};
