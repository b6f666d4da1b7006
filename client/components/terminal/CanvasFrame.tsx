import React from "react";
import { Box, Text } from "ink";
import type { Point } from "../../core/viewstate/CoordinateService";

/** Border line with the title set into it: `┌ title ──┐` */
export function titledTopBorder(title: string, width: number): string {
  const inner = Math.max(0, width - 2);
  const label = Array.from(` ${title} `).slice(0, inner).join("");
  return `┌${label}${"─".repeat(inner - Array.from(label).length)}┐`;
}

export function bottomBorder(width: number): string {
  return `└${"─".repeat(Math.max(0, width - 2))}┘`;
}

function CanvasRow({ row, caretX }: { row: string; caretX: number | null }) {
  if (caretX === null) return <Text>{row}</Text>;
  const cells = Array.from(row);
  return (
    <Text>
      {cells.slice(0, caretX).join("")}
      <Text inverse>{cells[caretX] ?? " "}</Text>
      {cells.slice(caretX + 1).join("")}
    </Text>
  );
}

export default function CanvasFrame({
  title,
  rows,
  width,
  color,
  caret,
}: {
  title: string;
  rows: string[];
  /** Frame width including the border */
  width: number;
  color: string;
  /** Insert caret in canvas cells */
  caret: Point | null;
}) {
  return (
    <Box flexDirection="column">
      <Text color={color}>{titledTopBorder(title, width)}</Text>
      {rows.map((row, y) => (
        <Box key={y}>
          <Text color={color}>│</Text>
          <CanvasRow row={row} caretX={caret && caret.y === y ? caret.x : null} />
          <Text color={color}>│</Text>
        </Box>
      ))}
      <Text color={color}>{bottomBorder(width)}</Text>
    </Box>
  );
}
