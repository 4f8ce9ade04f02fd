import { Box, Text } from "ink";
import { comparePositions } from "../lib/vim/position.js";
import type { Position, Span } from "../lib/vim/types.js";

interface PromptInputProps {
  lines: readonly string[];
  cursor: Position;
  /** Visual selection, both ends included; null outside visual mode */
  selection: Span | null;
  prompt: string;
}

export type SegmentKind = "plain" | "selected" | "cursor";

export interface Segment {
  text: string;
  kind: SegmentKind;
}

/**
 * Split one line into runs of plain, selected and cursor text. A cursor
 * past the last character is drawn as a space.
 */
export function segmentLine(
  line: string,
  row: number,
  cursor: Position,
  selection: Span | null,
): Segment[] {
  const segments: Segment[] = [];
  const chars = cursor.row === row && cursor.col >= line.length ? line + " " : line;

  const kindAt = (col: number): SegmentKind => {
    if (cursor.row === row && cursor.col === col) return "cursor";
    if (!selection) return "plain";
    const pos = { row, col };
    return comparePositions(pos, selection.start) >= 0 &&
      comparePositions(pos, selection.end) <= 0
      ? "selected"
      : "plain";
  };

  for (let col = 0; col < chars.length; col++) {
    const char = chars[col] ?? "";
    const kind = kindAt(col);
    const last = segments[segments.length - 1];
    if (last && last.kind === kind) {
      last.text += char;
    } else {
      segments.push({ text: char, kind });
    }
  }

  return segments;
}

export default function PromptInput({
  lines,
  cursor,
  selection,
  prompt,
}: PromptInputProps) {
  const indent = " ".repeat(prompt.length);

  return (
    <Box flexDirection="column" paddingX={1}>
      {lines.map((line, row) => (
        <Box key={row} gap={1}>
          <Text color="cyan" bold>
            {row === 0 ? prompt : indent}
          </Text>
          <Text>
            {segmentLine(line, row, cursor, selection).map((segment, i) => {
              switch (segment.kind) {
                case "cursor":
                  return (
                    <Text key={i} inverse>
                      {segment.text}
                    </Text>
                  );
                case "selected":
                  return (
                    <Text key={i} backgroundColor="yellow" color="black">
                      {segment.text}
                    </Text>
                  );
                default:
                  return <Text key={i}>{segment.text}</Text>;
              }
            })}
          </Text>
        </Box>
      ))}
    </Box>
  );
}
