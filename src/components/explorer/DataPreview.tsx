import { useMemo } from "react";
import { Download } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import { getDisplayColumns, previewRows, type PreviewColumn } from "@/lib/csvExport";
import type { PaperDataset } from "@/lib/papers";

const columnLabels: Record<PreviewColumn, string> = {
  title: "Title",
  authors: "Authors",
  journal: "Journal",
  publication_year: "Year",
};

interface DataPreviewProps {
  dataset: PaperDataset;
  limit: number;
  onDownload: () => void;
}

export const DataPreview = ({ dataset, limit, onDownload }: DataPreviewProps) => {
  const columns = useMemo(() => getDisplayColumns(dataset), [dataset]);
  const rows = useMemo(() => previewRows(dataset, limit), [dataset, limit]);

  if (!columns.length) {
    return <p className="text-sm text-muted-foreground">No data available for preview</p>;
  }

  return (
    <div className="space-y-3">
      <div className="flex flex-wrap items-center justify-between gap-2 text-xs text-muted-foreground">
        <span>
          Showing {rows.length} of {dataset.records.length} papers
        </span>
        <Button variant="outline" size="sm" onClick={onDownload}>
          <Download className="h-4 w-4" />
          Download Filtered Data as CSV
        </Button>
      </div>
      <div className="max-h-[400px] overflow-auto rounded-md border border-border/60 bg-card/40">
        <Table>
          <TableHeader>
            <TableRow>
              {columns.map((column) => (
                <TableHead key={column}>{columnLabels[column]}</TableHead>
              ))}
            </TableRow>
          </TableHeader>
          <TableBody>
            {rows.map((row, index) => (
              <TableRow key={index}>
                {columns.map((column) => (
                  <TableCell key={column} className={column === "publication_year" ? "text-right" : undefined}>
                    {row[column] ?? ""}
                  </TableCell>
                ))}
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </div>
    </div>
  );
};
