import React from "react";
import { Box, Text } from "ink";
import type { ModeKind } from "../../core/orchestration/types";

export const MODE_STYLES: Record<ModeKind, { label: string; color: string }> = {
  normal: { label: " NORMAL ", color: "blue" },
  insert: { label: " INSERT ", color: "green" },
  leader: { label: " LEADER ", color: "yellow" },
  resize: { label: " RESIZE ", color: "magenta" },
  help: { label: " HELP ", color: "cyan" },
  "context-menu": { label: " MENU ", color: "white" },
};

export default function StatusBar({ mode, message, width }: { mode: ModeKind; message: string; width: number }) {
  const style = MODE_STYLES[mode];
  const rest = ` | ${message}`;
  const restWidth = Math.max(0, width - style.label.length);
  const padded = Array.from(rest).slice(0, restWidth).join("").padEnd(restWidth, " ");
  return (
    <Box>
      <Text backgroundColor={style.color} color="black" bold>
        {style.label}
      </Text>
      <Text backgroundColor="gray">{padded}</Text>
    </Box>
  );
}
