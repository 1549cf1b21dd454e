import React from "react";
import { Box, Text } from "ink";
import type { MessageLevel } from "../lib/types.js";

interface MessageLineProps {
  level: MessageLevel;
  text: string;
}

const COLORS: Record<MessageLevel, string> = {
  info: "cyan",
  success: "green",
  warning: "yellow",
  error: "red",
};

const PREFIXES: Record<MessageLevel, string> = {
  info: "==>",
  success: "==>",
  warning: "Warning:",
  error: "Error:",
};

export function MessageLine({ level, text }: MessageLineProps) {
  return (
    <Box>
      <Text color={COLORS[level]} bold>
        {PREFIXES[level]}
      </Text>
      <Text> {text}</Text>
    </Box>
  );
}
