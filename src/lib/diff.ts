/**
 * Line diffs between a flake.nix on disk and its rendered counterpart.
 *
 * Orientation: the file on disk is "old", the render is "new", so + lines are
 * what regeneration would add.
 */

import { createTwoFilesPatch, diffLines, parsePatch } from "diff";

export interface DiffCounts {
  linesAdded: number;
  linesRemoved: number;
}

export interface DiffLine {
  type: "add" | "remove" | "context";
  content: string;
}

export interface DiffHunk {
  header: string;
  lines: DiffLine[];
}

export function computeDiffCounts(oldText: string, newText: string): DiffCounts {
  const changes = diffLines(oldText, newText);
  let linesAdded = 0;
  let linesRemoved = 0;

  for (const change of changes) {
    const lineCount = change.count ?? 0;
    if (change.added) {
      linesAdded += lineCount;
    } else if (change.removed) {
      linesRemoved += lineCount;
    }
  }

  return { linesAdded, linesRemoved };
}

export function computeUnifiedDiff(oldText: string, newText: string, oldLabel: string, newLabel: string): DiffHunk[] {
  const patch = createTwoFilesPatch(oldLabel, newLabel, oldText, newText, "", "", { context: 3 });

  const hunks: DiffHunk[] = [];
  for (const file of parsePatch(patch)) {
    for (const hunk of file.hunks) {
      const lines: DiffLine[] = [];
      for (const line of hunk.lines) {
        const prefix = line[0];
        const content = line.slice(1);
        if (prefix === "+") {
          lines.push({ type: "add", content });
        } else if (prefix === "-") {
          lines.push({ type: "remove", content });
        } else if (prefix === " ") {
          lines.push({ type: "context", content });
        }
      }
      hunks.push({
        header: `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
        lines,
      });
    }
  }

  return hunks;
}

/** Hunks flattened to printable lines with +/-/space prefixes. */
export function formatHunks(hunks: DiffHunk[]): string[] {
  const prefix = { add: "+", remove: "-", context: " " } as const;
  return hunks.flatMap((hunk) => [hunk.header, ...hunk.lines.map((line) => `${prefix[line.type]}${line.content}`)]);
}

export function describeDrift({ linesAdded, linesRemoved }: DiffCounts): string {
  return `+${linesAdded} -${linesRemoved} lines`;
}
