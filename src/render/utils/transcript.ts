export interface TranscriptMetadataEntry {
  label: string;
  value?: string | null;
}

export interface TranscriptOptions {
  metadata?: readonly TranscriptMetadataEntry[];
  sections?: readonly (readonly string[])[];
  hint?: string;
}

/**
 * Joins `label: value` metadata and line sections, separated by blank lines.
 * Empty sections and metadata without a value are skipped.
 */
export function renderTranscript({
  metadata = [],
  sections = [],
  hint,
}: TranscriptOptions): string {
  const blocks: string[][] = [];

  const metadataLines = metadata
    .filter((entry): entry is TranscriptMetadataEntry & { value: string } => {
      return typeof entry.value === "string" && entry.value.length > 0;
    })
    .map((entry) => `${entry.label}: ${entry.value}`);

  if (metadataLines.length > 0) {
    blocks.push(metadataLines);
  }

  for (const section of sections) {
    if (section.length > 0) {
      blocks.push([...section]);
    }
  }

  if (hint) {
    blocks.push([hint]);
  }

  return blocks.map((block) => block.join("\n")).join("\n\n");
}
