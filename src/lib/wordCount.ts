// Missing cells count as the literal "nan", so an absent title is one word.
export const MISSING_TEXT = "nan";

export const toText = (value: unknown) => {
  if (value === null || value === undefined) return MISSING_TEXT;
  if (typeof value === "number" && Number.isNaN(value)) return MISSING_TEXT;
  return String(value);
};

export const countWords = (value: unknown) =>
  toText(value)
    .split(/\s+/)
    .filter(Boolean).length;
