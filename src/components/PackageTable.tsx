import React, { useMemo } from "react";
import { Box, Text } from "ink";
import type { PackageKind, PackageRow } from "../lib/types.js";

interface PackageTableProps {
  profile: string;
  rows: PackageRow[];
}

const KIND_LABELS: Record<PackageKind, string> = {
  plain: "nixpkgs",
  resolved: "pinned",
  custom: "flake",
  local: "local",
  "local-flake": "local flake",
};

const KIND_COLORS: Record<PackageKind, string> = {
  plain: "white",
  resolved: "green",
  custom: "magenta",
  local: "blue",
  "local-flake": "blue",
};

export function PackageTable({ profile, rows }: PackageTableProps) {
  const maxNameLen = useMemo(() => Math.min(30, Math.max(...rows.map((row) => row.name.length), 4)), [rows]);

  return (
    <Box flexDirection="column">
      <Text>
        <Text color="cyan" bold>
          ==&gt;
        </Text>{" "}
        Installed packages ({profile}):
      </Text>
      {rows.length === 0 && <Text color="gray">  (none)</Text>}
      {rows.map((row) => (
        <Box key={row.name}>
          <Text>  {row.name.padEnd(maxNameLen)}  </Text>
          <Text color={KIND_COLORS[row.kind]}>{KIND_LABELS[row.kind].padEnd(11)}</Text>
          <Text color="gray">  {row.detail}</Text>
          {row.platforms && row.platforms.length > 0 && <Text color="yellow"> [{row.platforms.join(", ")}]</Text>}
        </Box>
      ))}
    </Box>
  );
}
