import { AlertTriangle, ClipboardList } from "lucide-react";

export const DemoWarning = () => (
  <div className="rounded-md border-l-4 border-rose-500 bg-rose-50 p-4 text-sm text-rose-900">
    <p className="flex items-center gap-2 font-semibold">
      <AlertTriangle className="h-4 w-4" />
      Using demonstration data. To use your real data:
    </p>
    <ol className="mt-2 list-decimal space-y-0.5 pl-6">
      <li>Run the data cleaning script first</li>
      <li>Save the file as 'cleaned_cord19_data.csv'</li>
      <li>Place it on your Desktop or in the same folder as this app</li>
    </ol>
  </div>
);

export const RealDataInstructions = () => (
  <section className="space-y-2 border-t border-border/60 pt-6 text-sm">
    <h2 className="flex items-center gap-2 text-lg font-semibold text-foreground">
      <ClipboardList className="h-5 w-5 text-primary" />
      How to Use Your Real Data
    </h2>
    <ol className="list-decimal space-y-1 pl-6 text-muted-foreground">
      <li>
        <strong className="text-foreground">Run the data cleaning script</strong> to process your CORD-19 metadata
      </li>
      <li>
        <strong className="text-foreground">Save the cleaned data</strong> as <code>cleaned_cord19_data.csv</code>
      </li>
      <li>
        <strong className="text-foreground">Place the file</strong> on your Desktop or in the same folder as this app
      </li>
      <li>
        <strong className="text-foreground">Restart this app</strong> to load your real data
      </li>
    </ol>
  </section>
);
