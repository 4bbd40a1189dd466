import { Box, Text } from "ink";
import type { AppMode, StatusKind, StatusMessage } from "../stores/app-state.js";

const STATUS_COLORS: Record<StatusKind, string> = {
  info: "gray",
  loading: "yellow",
  error: "red",
};

const KEY_HINTS: Record<AppMode, string> = {
  empty: "Esc edit URL · q quit",
  editing: "Enter load · Tab back to list · Ctrl+C quit",
  loaded: "↑↓ move · Enter open · r refresh · Esc edit URL · q quit",
  detail: "↑↓ move · Tab back to list · r refresh · Esc edit URL · q quit",
  terminated: "",
};

export function StatusBar({ status, mode }: { status: StatusMessage; mode: AppMode }) {
  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color={STATUS_COLORS[status.kind]} wrap="truncate-end">{status.text}</Text>
      <Text dimColor>{KEY_HINTS[mode]}</Text>
    </Box>
  );
}
