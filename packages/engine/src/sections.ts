export type SectionMarker =
  | 'header'
  | 'holeCards'
  | 'flop'
  | 'turn'
  | 'river'
  | 'showDown'
  | 'summary'
  | 'unknown';

export interface HandSection {
  marker: SectionMarker;
  /** Marker text as written, e.g. `SHOW DOWN`; empty for header and stray blocks. */
  label: string;
  /** Text following the marker on its own line, usually the board. */
  board: string | null;
  lines: string[];
}

const MARKER_RE = /^\*{3}\s*(.*?)\s*\*{3}\s*(.*)$/;

const MARKERS: Record<string, SectionMarker> = {
  HOLECARDS: 'holeCards',
  FLOP: 'flop',
  TURN: 'turn',
  RIVER: 'river',
  SHOWDOWN: 'showDown',
  SUMMARY: 'summary',
};

export function markerFor(label: string): SectionMarker {
  return MARKERS[label.replace(/\s+/g, '').toUpperCase()] ?? 'unknown';
}

/**
 * Splits one hand into its `*** MARKER ***` blocks. The leading block is the
 * header; a blank line closes the current block, and anything between it and
 * the next marker lands in an `unknown` block.
 */
export function splitSections(raw: string): HandSection[] {
  const sections: HandSection[] = [];
  let current: HandSection | null = { marker: 'header', label: '', board: null, lines: [] };
  sections.push(current);

  for (const rawLine of raw.trim().split(/\r?\n/)) {
    const line = rawLine.trim();
    const marker = MARKER_RE.exec(line);
    if (marker) {
      current = {
        marker: markerFor(marker[1]),
        label: marker[1].replace(/\s+/g, ' ').toUpperCase(),
        board: marker[2] ? marker[2] : null,
        lines: [],
      };
      sections.push(current);
    } else if (!line) {
      current = null;
    } else {
      if (!current) {
        current = { marker: 'unknown', label: '', board: null, lines: [] };
        sections.push(current);
      }
      current.lines.push(line);
    }
  }
  return sections;
}

export function findSection(sections: readonly HandSection[], marker: SectionMarker): HandSection | null {
  return sections.find((section) => section.marker === marker) ?? null;
}
