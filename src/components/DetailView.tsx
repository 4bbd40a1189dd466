import { Box, Text } from "ink";
import type { FeedItem } from "../services/feed-fetcher.js";
import { formatPublished } from "../utils/format.js";

export function DetailView({ item }: { item: FeedItem | null }) {
  if (!item) {
    return <Text dimColor>Select an item to read it here.</Text>;
  }

  return (
    <Box flexDirection="column">
      <Text bold color="cyan">{item.title}</Text>
      <Text color="blue">{item.link || "(no link)"}</Text>
      <Text dimColor>Published: {formatPublished(item.published)}</Text>
      <Box marginTop={1}>
        <Text>{item.summary || "No summary."}</Text>
      </Box>
    </Box>
  );
}
