import React from "react";
import { Box, Text } from "ink";

const viewerKeys = [
  { key: "j / ↓", desc: "Scroll down one line" },
  { key: "k / ↑", desc: "Scroll up one line" },
  { key: "Ctrl+d/PgDn", desc: "Page down" },
  { key: "Ctrl+u/PgUp", desc: "Page up" },
  { key: "g / G", desc: "First / Last line" },
  { key: "?", desc: "Toggle help" },
  { key: "q / Esc", desc: "Quit" },
];

export function HelpDialog() {
  return (
    <Box flexDirection="column" borderStyle="single" paddingX={2} paddingY={1}>
      <Box justifyContent="center" marginBottom={1}>
        <Text bold>KEYS</Text>
      </Box>
      {viewerKeys.map(({ key, desc }) => (
        <Box key={key}>
          <Box width={14}>
            <Text bold>{key}</Text>
          </Box>
          <Text>{desc}</Text>
        </Box>
      ))}
    </Box>
  );
}
