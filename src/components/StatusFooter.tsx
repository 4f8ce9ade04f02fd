import { Box, Text } from "ink";
import type { VimMode } from "../lib/vim/types.js";

interface StatusFooterProps {
  mode: VimMode;
  pendingKeys: string;
  viMode: boolean;
}

const MODE_LABELS: Record<VimMode, { label: string; color: string }> = {
  insert: { label: "INSERT", color: "green" },
  normal: { label: "NORMAL", color: "blue" },
  visual: { label: "VISUAL", color: "yellow" },
};

export default function StatusFooter({
  mode,
  pendingKeys,
  viMode,
}: StatusFooterProps) {
  if (!viMode) return null;

  const { label, color } = MODE_LABELS[mode];

  return (
    <Box paddingX={1} gap={2}>
      <Text color={color} bold>
        -- {label} --
      </Text>
      {pendingKeys !== "" && <Text dimColor>{pendingKeys}</Text>}
    </Box>
  );
}
