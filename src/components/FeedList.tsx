import { Box, Text } from "ink";
import type { FeedItem } from "../services/feed-fetcher.js";
import { formatPublished } from "../utils/format.js";

interface FeedListProps {
  items: readonly FeedItem[];
  selection: number | null;
  focused: boolean;
  /** Rows available; longer lists scroll to keep the selection in view. */
  height: number;
}

export function visibleWindow(
  count: number,
  selection: number | null,
  height: number,
): { start: number; end: number } {
  if (height <= 0 || count <= height) return { start: 0, end: count };
  const anchor = selection ?? 0;
  const start = Math.min(Math.max(anchor - Math.floor(height / 2), 0), count - height);
  return { start, end: start + height };
}

export function FeedList({ items, selection, focused, height }: FeedListProps) {
  if (items.length === 0) {
    return <Text dimColor>This feed has no items.</Text>;
  }

  const { start, end } = visibleWindow(items.length, selection, height);

  return (
    <Box flexDirection="column">
      {items.slice(start, end).map((item, offset) => {
        const index = start + offset;
        const selected = index === selection;
        return (
          <Box key={`${index}:${item.id}`}>
            <Box flexShrink={1}>
              <Text
                wrap="truncate-end"
                bold={selected}
                inverse={selected && focused}
                color={selected ? "cyan" : undefined}
              >
                {selected ? "›" : " "} {item.title}
              </Text>
            </Box>
            {item.published && (
              <Box flexShrink={0} marginLeft={1}>
                <Text dimColor>{formatPublished(item.published)}</Text>
              </Box>
            )}
          </Box>
        );
      })}
    </Box>
  );
}
