import { render } from "ink-testing-library";
import { describe, expect, it } from "vitest";
import { App } from "./app.js";
import { createAppStore } from "./stores/app-store.js";
import { FakeFeedSource, makeFeed } from "./test/fixtures.js";

const FEED_URL = "https://example.com/feed.xml";

describe("App", () => {
  it("asks for a URL when nothing is loaded", () => {
    const store = createAppStore(new FakeFeedSource());
    const { lastFrame, unmount } = render(<App store={store} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("No feed loaded.");
    expect(frame).toContain("Enter an RSS feed URL to get started");
    unmount();
  });

  it("shows the list and the selected item's details", async () => {
    const source = new FakeFeedSource().respond(FEED_URL, makeFeed(["A", "B", "C"]));
    const store = createAppStore(source);
    const { dispatch } = store.getState();
    await dispatch({ type: "input/submitted", value: FEED_URL });
    await dispatch({ type: "cursor/down" });
    await dispatch({ type: "item/selected" });

    const { lastFrame, unmount } = render(<App store={store} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("  A");
    expect(frame).toContain("› B");
    expect(frame).toContain("  C");
    expect(frame).toContain("https://example.com/b");
    expect(frame).toContain("Summary of B");
    expect(frame).toContain("Loaded: Example (3 items)");
    unmount();
  });
});
