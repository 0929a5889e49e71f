import { useEffect, useMemo, useState } from "react";
import cloud from "d3-cloud";
import { AlertTriangle } from "lucide-react";
import type { PaperDataset } from "@/lib/papers";
import { buildTitleCorpus, computeWordFrequencies, fontSizeFor } from "@/lib/wordCloud";

type CloudWord = cloud.Word & { text: string; size: number };

type CloudState =
  | { status: "pending" }
  | { status: "ready"; words: CloudWord[] }
  | { status: "error"; message: string };

interface TitleWordCloudProps {
  dataset: PaperDataset;
  width: number;
  height: number;
  maxWords: number;
}

const palette = ["#440154", "#3b528b", "#21918c", "#5ec962", "#1f77b4", "#ff7f0e"];

export const TitleWordCloud = ({ dataset, width, height, maxWords }: TitleWordCloudProps) => {
  const corpus = useMemo(() => buildTitleCorpus(dataset), [dataset]);
  const [state, setState] = useState<CloudState>({ status: "pending" });

  useEffect(() => {
    let words: CloudWord[];
    try {
      words = computeWordFrequencies(corpus, { maxWords }).map((word) => ({
        text: word.text,
        size: fontSizeFor(word.weight),
      }));
    } catch (err) {
      setState({ status: "error", message: err instanceof Error ? err.message : String(err) });
      return;
    }

    setState({ status: "pending" });
    const layout = cloud<CloudWord>()
      .size([width, height])
      .words(words)
      .padding(2)
      .rotate((_word, i) => (i % 10 === 9 ? 90 : 0))
      .font("sans-serif")
      .fontSize((word) => word.size)
      .on("end", (placed) => {
        if (!placed.length) {
          setState({ status: "error", message: "none of the words fit the canvas" });
          return;
        }
        setState({ status: "ready", words: placed });
      });
    layout.start();
    return () => {
      layout.stop();
    };
  }, [corpus, maxWords, width, height]);

  if (!dataset.records.length) {
    return <p className="text-sm text-muted-foreground">No data available for word cloud</p>;
  }

  if (state.status === "error") {
    return (
      <div
        role="alert"
        className="flex items-start gap-2 rounded-md border border-amber-200 bg-amber-50 px-3 py-2 text-sm text-amber-800"
      >
        <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0" />
        <span>Could not generate word cloud: {state.message}</span>
      </div>
    );
  }

  if (state.status === "pending") {
    return <p className="text-sm text-muted-foreground">Generating word cloud…</p>;
  }

  return (
    <figure className="space-y-2">
      <figcaption className="text-sm font-semibold text-foreground">Common Words in Paper Titles</figcaption>
      <svg
        viewBox={`0 0 ${width} ${height}`}
        className="h-auto w-full max-w-[900px] rounded-md border border-border/60 bg-white"
        role="img"
        aria-label="Word cloud of paper titles"
      >
        <g transform={`translate(${width / 2},${height / 2})`}>
          {state.words.map((word, i) => (
            <text
              key={word.text}
              textAnchor="middle"
              transform={`translate(${word.x ?? 0},${word.y ?? 0}) rotate(${word.rotate ?? 0})`}
              style={{ fontSize: word.size, fontFamily: "sans-serif" }}
              fill={palette[i % palette.length]}
            >
              {word.text}
            </text>
          ))}
        </g>
      </svg>
    </figure>
  );
};
