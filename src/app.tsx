import { useEffect } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useStore } from "zustand";
import { DetailView } from "./components/DetailView.js";
import { FeedList } from "./components/FeedList.js";
import { StatusBar } from "./components/StatusBar.js";
import { UrlInput } from "./components/UrlInput.js";
import { APP_NAME } from "./config.js";
import { keyToMessage } from "./keymap.js";
import { selectedItem } from "./stores/app-state.js";
import type { AppStoreApi } from "./stores/app-store.js";

const DEFAULT_ROWS = 24;
// Rows outside the list body (header, URL box, pane borders, status bar) plus one spare.
const CHROME_ROWS = 9;

export function App({ store }: { store: AppStoreApi }) {
  const state = useStore(store, (s) => s.state);
  const dispatch = useStore(store, (s) => s.dispatch);
  const { exit } = useApp();
  const { stdout } = useStdout();

  const rows = stdout.rows || DEFAULT_ROWS;
  const paneHeight = Math.max(rows - CHROME_ROWS, 3);

  useInput((input, key) => {
    const message = keyToMessage(input, key, store.getState().state.mode);
    if (message) void dispatch(message);
  });

  useEffect(() => {
    if (state.mode === "terminated") exit();
  }, [state.mode, exit]);

  const listFocused = state.mode === "loaded";
  const detailFocused = state.mode === "detail";

  return (
    <Box flexDirection="column">
      <Box paddingX={1}>
        <Text bold color="cyan">{APP_NAME}</Text>
        <Text dimColor> · {state.feed ? state.feed.title : "RSS Feed Reader"}</Text>
      </Box>

      <UrlInput
        value={state.input}
        focused={state.mode === "editing"}
        onChange={(value) => void dispatch({ type: "input/changed", value })}
        onSubmit={(value) => void dispatch({ type: "input/submitted", value })}
      />

      <Box height={paneHeight + 2}>
        <Box
          width="40%"
          flexDirection="column"
          borderStyle="single"
          borderColor={listFocused ? "cyan" : "gray"}
          paddingX={1}
        >
          {state.feed ? (
            <FeedList
              items={state.feed.items}
              selection={state.selection}
              focused={listFocused}
              height={paneHeight}
            />
          ) : (
            <Text dimColor>No feed loaded.</Text>
          )}
        </Box>
        <Box
          width="60%"
          flexDirection="column"
          borderStyle="single"
          borderColor={detailFocused ? "cyan" : "gray"}
          paddingX={1}
          overflow="hidden"
        >
          <DetailView item={selectedItem(state)} />
        </Box>
      </Box>

      <StatusBar status={state.status} mode={state.mode} />
    </Box>
  );
}
