import React from "react";
import { Box, Text } from "ink";
import type { SearchResult } from "../lib/types.js";

interface SearchResultsProps {
  query: string;
  results: SearchResult[];
}

export function SearchResults({ query, results }: SearchResultsProps) {
  if (results.length === 0) {
    return <Text color="gray">No packages found matching '{query}'</Text>;
  }

  return (
    <Box flexDirection="column">
      {results.map((result) => (
        <Box key={result.name} flexDirection="column">
          <Text>
            <Text bold>{result.name}</Text>
            {result.lastUpdated && <Text color="gray"> (updated {result.lastUpdated})</Text>}
          </Text>
          {result.summary.length > 0 && <Text color="gray">    {result.summary}</Text>}
        </Box>
      ))}
    </Box>
  );
}
