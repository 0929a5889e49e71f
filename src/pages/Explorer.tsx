import { useMemo, useState } from "react";
import { BarChart3, BookOpen, Cloud, Loader2, Table2 } from "lucide-react";
import { toast } from "sonner";
import { SiteShell } from "@/components/SiteShell";
import { NoticeList } from "@/components/NoticeList";
import { PanelErrorBoundary } from "@/components/PanelErrorBoundary";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { FilterSidebar } from "@/components/explorer/FilterSidebar";
import { MetricsGrid } from "@/components/explorer/MetricsGrid";
import { PublicationTrendChart } from "@/components/explorer/PublicationTrendChart";
import { TopJournalsChart } from "@/components/explorer/TopJournalsChart";
import { TitleWordCloud } from "@/components/explorer/TitleWordCloud";
import { DataPreview } from "@/components/explorer/DataPreview";
import { DemoWarning, RealDataInstructions } from "@/components/explorer/DemoInstructions";
import { useDataset } from "@/hooks/useDataset";
import { EXPORT_FILE_NAME, downloadCsv, papersToCsv } from "@/lib/csvExport";
import {
  ALL_JOURNALS,
  clampYearRange,
  filterPapers,
  getJournalOptions,
  getYearBounds,
  type YearRange,
} from "@/lib/filters";
import { summarizePapers } from "@/lib/metrics";
import { DEFAULT_PUBLICATION_YEAR, isDemoResult, type DatasetResponse } from "@/lib/papers";

const tabs = [
  { key: "trends", label: "Publication Trends", icon: BarChart3 },
  { key: "journals", label: "Journal Analysis", icon: BookOpen },
  { key: "content", label: "Content Analysis", icon: Cloud },
  { key: "data", label: "Data Explorer", icon: Table2 },
] as const;

type TabKey = (typeof tabs)[number]["key"];

export const ExplorerDashboard = ({ result, settings }: DatasetResponse) => {
  const dataset = result.dataset;
  const demo = isDemoResult(result);

  const bounds = useMemo(
    () => getYearBounds(dataset) ?? { min: DEFAULT_PUBLICATION_YEAR, max: DEFAULT_PUBLICATION_YEAR },
    [dataset],
  );
  const journals = useMemo(() => getJournalOptions(dataset), [dataset]);

  const [yearRange, setYearRange] = useState<YearRange>([bounds.min, bounds.max]);
  const [journal, setJournal] = useState(ALL_JOURNALS);
  const [activeTab, setActiveTab] = useState<TabKey>("trends");

  const filtered = useMemo(
    () => filterPapers(dataset, { yearRange: clampYearRange(yearRange, bounds), journal }),
    [dataset, yearRange, bounds, journal],
  );
  const summary = useMemo(() => summarizePapers(filtered), [filtered]);

  const handleDownload = () => {
    const csv = papersToCsv(filtered);
    if (!csv) return;
    downloadCsv(csv, EXPORT_FILE_NAME);
    toast.success("Exported CSV", { description: `Downloaded ${EXPORT_FILE_NAME}` });
  };

  return (
    <main className="container mx-auto space-y-6 px-4 py-6">
      <NoticeList notices={result.notices} />
      {demo && <DemoWarning />}

      <div className="grid gap-6 lg:grid-cols-[280px_1fr]">
        <aside>
          <FilterSidebar
            bounds={bounds}
            yearRange={yearRange}
            onYearRangeChange={(range) => setYearRange(clampYearRange(range, bounds))}
            journals={journals}
            journal={journal}
            onJournalChange={setJournal}
            matchCount={filtered.records.length}
          />
        </aside>

        <div className="min-w-0 space-y-6">
          <MetricsGrid summary={summary} />

          <Card className="border-border/60">
            <CardHeader className="space-y-3 pb-2">
              <CardTitle className="flex items-center gap-2 text-orange-600">
                <BarChart3 className="h-5 w-5" />
                Visualizations
              </CardTitle>
              <div className="flex flex-wrap gap-2" role="tablist">
                {tabs.map(({ key, label, icon: Icon }) => (
                  <Button
                    key={key}
                    type="button"
                    role="tab"
                    variant="outline"
                    size="sm"
                    className={
                      activeTab === key
                        ? "h-8 bg-muted text-foreground"
                        : "h-8 text-muted-foreground hover:border-orange-200 hover:bg-orange-50 hover:text-orange-700"
                    }
                    aria-selected={activeTab === key}
                    onClick={() => setActiveTab(key)}
                  >
                    <Icon className="h-3.5 w-3.5" />
                    {label}
                  </Button>
                ))}
              </div>
            </CardHeader>
            <CardContent className="pt-4">
              <PanelErrorBoundary
                panel={activeTab}
                resetKeys={[activeTab, filtered.records.length, journal, yearRange[0], yearRange[1]]}
              >
                {activeTab === "trends" && (
                  <section className="space-y-2">
                    <h3 className="font-semibold">Publications by Year</h3>
                    <PublicationTrendChart dataset={filtered} />
                  </section>
                )}
                {activeTab === "journals" && (
                  <section className="space-y-2">
                    <h3 className="font-semibold">Top Journals</h3>
                    <TopJournalsChart dataset={filtered} limit={settings.topJournals} />
                  </section>
                )}
                {activeTab === "content" && (
                  <section className="space-y-2">
                    <h3 className="font-semibold">Word Cloud - Titles</h3>
                    <TitleWordCloud
                      dataset={filtered}
                      width={settings.wordCloud.width}
                      height={settings.wordCloud.height}
                      maxWords={settings.wordCloud.maxWords}
                    />
                  </section>
                )}
                {activeTab === "data" && (
                  <section className="space-y-2">
                    <h3 className="font-semibold">Data Preview</h3>
                    <DataPreview dataset={filtered} limit={settings.previewRows} onDownload={handleDownload} />
                  </section>
                )}
              </PanelErrorBoundary>
            </CardContent>
          </Card>
        </div>
      </div>

      {demo && <RealDataInstructions />}
    </main>
  );
};

const ExplorerPage = () => {
  const state = useDataset();

  return (
    <SiteShell>
      {state.status === "loading" ? (
        <div className="container mx-auto flex items-center gap-2 px-4 py-10 text-sm text-muted-foreground">
          <Loader2 className="h-4 w-4 animate-spin" />
          Loading data... Please wait.
        </div>
      ) : (
        <ExplorerDashboard result={state.result} settings={state.settings} />
      )}
    </SiteShell>
  );
};

export default ExplorerPage;
