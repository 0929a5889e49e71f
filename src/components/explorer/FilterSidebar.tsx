import { Filter } from "lucide-react";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Slider } from "@/components/ui/slider";
import type { YearBounds, YearRange } from "@/lib/filters";

interface FilterSidebarProps {
  bounds: YearBounds;
  yearRange: YearRange;
  onYearRangeChange: (range: YearRange) => void;
  journals: string[];
  journal: string;
  onJournalChange: (journal: string) => void;
  /** Papers left after both filters. */
  matchCount: number;
}

export const FilterSidebar = ({
  bounds,
  yearRange,
  onYearRangeChange,
  journals,
  journal,
  onJournalChange,
  matchCount,
}: FilterSidebarProps) => (
  <Card className="border-border/60">
    <CardHeader className="pb-3">
      <div className="flex items-center gap-2">
        <Filter className="h-4 w-4 text-primary" />
        <CardTitle className="text-base">Filters &amp; Controls</CardTitle>
      </div>
    </CardHeader>
    <CardContent className="space-y-6 text-sm">
      <div className="space-y-3">
        <div className="flex items-center justify-between">
          <span id="year-range-label" className="font-semibold text-foreground">
            Select Publication Year Range
          </span>
          <span className="text-xs text-muted-foreground" data-testid="year-range-value">
            {yearRange[0]} – {yearRange[1]}
          </span>
        </div>
        {bounds.min === bounds.max ? (
          <p className="text-xs text-muted-foreground">All papers were published in {bounds.min}.</p>
        ) : (
          <>
            <Slider
              aria-labelledby="year-range-label"
              min={bounds.min}
              max={bounds.max}
              step={1}
              minStepsBetweenThumbs={0}
              value={yearRange}
              onValueChange={(values) => {
                const [from = bounds.min, to = bounds.max] = values;
                onYearRangeChange([from, to]);
              }}
            />
            <div className="flex justify-between text-[11px] text-muted-foreground">
              <span>{bounds.min}</span>
              <span>{bounds.max}</span>
            </div>
          </>
        )}
      </div>

      <label className="flex flex-col gap-2">
        <span className="font-semibold text-foreground">Filter by Journal</span>
        <select
          className="h-8 rounded border border-border bg-background px-2 text-xs"
          value={journal}
          onChange={(e) => onJournalChange(e.target.value)}
        >
          {journals.map((name) => (
            <option key={name} value={name}>
              {name}
            </option>
          ))}
        </select>
      </label>

      <div
        role="status"
        aria-label="Filter Results"
        className="space-y-0.5 rounded-md border border-sky-200 bg-sky-50 px-3 py-2 text-xs text-sky-900"
      >
        <p className="font-semibold">Filter Results:</p>
        <p>{matchCount.toLocaleString("en-US")} papers</p>
        <p>
          {yearRange[0]} - {yearRange[1]}
        </p>
      </div>
    </CardContent>
  </Card>
);
