/**
 * Line-oriented editing of marker-delimited regions in a flake.nix.
 *
 * A region is everything between a line containing `# [name]` and a line
 * containing `# [/name]`. Matching is by substring, and unbalanced markers
 * are tolerated: they produce an empty or partial region rather than an error.
 */

export const MARKERS = {
  packages: "nixy:packages",
  localPackages: "nixy:local-packages",
  customPackages: "nixy:custom-packages",
  customInputs: "nixy:custom-inputs",
  localInputs: "nixy:local-inputs",
  envPaths: "nixy:env-paths",
} as const;

export type MarkerName = (typeof MARKERS)[keyof typeof MARKERS];

export function openToken(name: string): string {
  return `# [${name}]`;
}

export function closeToken(name: string): string {
  return `# [/${name}]`;
}

interface SplitText {
  lines: string[];
  trailingNewline: boolean;
}

function splitLines(text: string): SplitText {
  if (text === "") {
    return { lines: [], trailingNewline: false };
  }
  const trailingNewline = text.endsWith("\n");
  const body = trailingNewline ? text.slice(0, -1) : text;
  // A CRLF line keeps its "\r"; joining with "\n" restores it unchanged.
  return { lines: body.split("\n"), trailingNewline };
}

function joinLines({ lines, trailingNewline }: SplitText): string {
  if (lines.length === 0) return "";
  return lines.join("\n") + (trailingNewline ? "\n" : "");
}

export function hasMarker(text: string, name: string): boolean {
  return text.includes(openToken(name));
}

export function hasAnyMarker(text: string): boolean {
  return Object.values(MARKERS).some((name) => hasMarker(text, name));
}

/** Insert `newLine` after every line holding the open token of `markerName`. */
export function insertAfterMarker(text: string, markerName: string, newLine: string): string {
  const token = openToken(markerName);
  const split = splitLines(text);
  const lines: string[] = [];
  for (const line of split.lines) {
    lines.push(line);
    if (line.includes(token)) {
      lines.push(line.endsWith("\r") ? `${newLine}\r` : newLine);
    }
  }
  return joinLines({ lines, trailingNewline: split.trailingNewline });
}

/**
 * Drop lines matching `pattern` while between `startMarker` and `endMarker`
 * (full tokens). Marker lines and lines outside the section are kept.
 */
export function removeFromSection(text: string, startMarker: string, endMarker: string, pattern: RegExp): string {
  // A global or sticky pattern would carry lastIndex from one line to the next.
  const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  const split = splitLines(text);
  const lines: string[] = [];
  let inside = false;
  for (const line of split.lines) {
    if (line.includes(startMarker)) {
      inside = true;
      lines.push(line);
      continue;
    }
    if (line.includes(endMarker)) {
      inside = false;
      lines.push(line);
      continue;
    }
    if (inside && matcher.test(line)) {
      continue;
    }
    lines.push(line);
  }
  return joinLines({ lines, trailingNewline: split.trailingNewline });
}

export function removeFromMarkerSection(text: string, markerName: string, pattern: RegExp): string {
  return removeFromSection(text, openToken(markerName), closeToken(markerName), pattern);
}

/** Lines strictly between the open and close tokens, each followed by a newline. */
export function extractSectionContent(text: string, markerName: string): string {
  const open = openToken(markerName);
  const close = closeToken(markerName);
  let inside = false;
  let content = "";
  for (const line of splitLines(text).lines) {
    if (line.includes(open)) {
      inside = true;
      continue;
    }
    if (line.includes(close)) {
      inside = false;
      continue;
    }
    if (inside) {
      content += `${line}\n`;
    }
  }
  return content;
}
