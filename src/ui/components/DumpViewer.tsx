import React, { useState } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import { HelpDialog } from "./HelpDialog";
import { applyScroll, describeRange, visibleRowCount, type ScrollAction } from "../scroll";
import { Logger } from "../../logger";

interface DumpViewerProps {
  title: string;
  header: readonly [string, string];
  lines: readonly string[];
}

export function DumpViewer({ title, header, lines }: DumpViewerProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [scrollOffset, setScrollOffset] = useState(0);
  const [showHelp, setShowHelp] = useState(false);

  const visible = visibleRowCount(stdout.rows ?? 24);

  const scroll = (action: ScrollAction) => {
    setScrollOffset((offset) => applyScroll(action, offset, lines.length, visible));
  };

  useInput((input, key) => {
    if (input === "q" || key.escape) {
      Logger.info("DumpViewer", "User quit viewer", { scrollOffset });
      exit();
    } else if (input === "?") {
      setShowHelp((shown) => !shown);
    } else if (input === "j" || key.downArrow) {
      scroll("lineDown");
    } else if (input === "k" || key.upArrow) {
      scroll("lineUp");
    } else if ((key.ctrl && input === "d") || key.pageDown) {
      scroll("pageDown");
    } else if ((key.ctrl && input === "u") || key.pageUp) {
      scroll("pageUp");
    } else if (input === "g") {
      scroll("top");
    } else if (input === "G") {
      scroll("bottom");
    }
  });

  if (showHelp) {
    return <HelpDialog />;
  }

  const shown = lines.slice(scrollOffset, scrollOffset + visible);

  return (
    <Box flexDirection="column">
      <Text bold>{header[0]}</Text>
      <Text>{header[1]}</Text>
      <Box flexDirection="column" height={visible}>
        {shown.map((line, i) => (
          <Text key={scrollOffset + i} wrap="truncate">{line}</Text>
        ))}
      </Box>
      <Box justifyContent="space-between">
        <Text>{title}</Text>
        <Text>{describeRange(scrollOffset, lines.length, visible)}  ? help  q quit</Text>
      </Box>
    </Box>
  );
}
