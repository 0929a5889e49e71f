import { useMemo } from "react";
import { countByYear, plotConfig, yearChartLayout, yearChartTraces } from "@/lib/charts";
import type { PaperDataset } from "@/lib/papers";
import { Plot } from "@/lib/plotly";

export const PublicationTrendChart = ({ dataset }: { dataset: PaperDataset }) => {
  const rows = useMemo(() => countByYear(dataset), [dataset]);

  if (!rows.length) {
    return <p className="text-sm text-muted-foreground">No publications match the selected filters.</p>;
  }

  return (
    <div className="h-[420px] w-full">
      <Plot
        data={yearChartTraces(rows)}
        layout={yearChartLayout}
        config={plotConfig}
        useResizeHandler
        style={{ width: "100%", height: "100%" }}
      />
    </div>
  );
};
