import path from "node:path";
import type { ClassifiedKind, DocumentIndicators } from "../extraction/lexicons";

export type DocumentClass = ClassifiedKind | "unknown";

export interface ClassificationResult {
  document_class: DocumentClass;
  indicator_counts: Record<ClassifiedKind, number>;
  filename_hint: ClassifiedKind | null;
}

// Ties between indicator counts go to the earlier kind.
const KIND_ORDER: ReadonlyArray<ClassifiedKind> = ["resume", "cover_letter", "reference_letter"];

export function classifyDocument(
  text: string,
  indicators: DocumentIndicators,
  fileName?: string,
): ClassificationResult {
  const scanned = text.slice(0, indicators.scanChars).toLowerCase();
  const counts: Record<ClassifiedKind, number> = {
    resume: countIndicators(scanned, indicators.indicators.resume),
    cover_letter: countIndicators(scanned, indicators.indicators.cover_letter),
    reference_letter: countIndicators(scanned, indicators.indicators.reference_letter),
  };
  const hint = fileName ? filenameHint(fileName, indicators) : null;
  if (hint) {
    return { document_class: hint, indicator_counts: counts, filename_hint: hint };
  }

  let best: ClassifiedKind | null = null;
  for (const kind of KIND_ORDER) {
    if (counts[kind] >= indicators.minIndicators && (best === null || counts[kind] > counts[best])) {
      best = kind;
    }
  }
  return { document_class: best ?? "unknown", indicator_counts: counts, filename_hint: null };
}

function countIndicators(scanned: string, words: ReadonlyArray<string>): number {
  return words.filter((word) => {
    const body = word
      .split(/\s+/)
      .map((part) => part.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&"))
      .join("\\s+");
    return new RegExp(`\\b${body}\\b`).test(scanned);
  }).length;
}

// Only a single unambiguous hint counts; "cover_letter_reference.pdf" falls back to the text.
function filenameHint(fileName: string, indicators: DocumentIndicators): ClassifiedKind | null {
  const tokens = path
    .basename(fileName, path.extname(fileName))
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
  const hinted = KIND_ORDER.filter((kind) =>
    indicators.filenameHints[kind].some((hint) => tokens.some((token) => token.startsWith(hint))),
  );
  return hinted.length === 1 ? hinted[0] : null;
}
