import { render } from "ink-testing-library";
import { describe, expect, it } from "vitest";
import { makeItem } from "../test/fixtures.js";
import { DetailView } from "./DetailView.js";

describe("DetailView", () => {
  it("shows title, link, date and summary", () => {
    const item = makeItem("B", { published: new Date(2025, 0, 6, 10, 0), summary: "Second item" });
    const { lastFrame } = render(<DetailView item={item} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("B");
    expect(frame).toContain("https://example.com/b");
    expect(frame).toContain("Published: 2025-01-06 10:00");
    expect(frame).toContain("Second item");
  });

  it("shows unknown for a missing date and notes a missing link", () => {
    const item = makeItem("C", { link: "", summary: "" });
    const { lastFrame } = render(<DetailView item={item} />);

    const frame = lastFrame() ?? "";
    expect(frame).toContain("Published: unknown");
    expect(frame).toContain("(no link)");
    expect(frame).toContain("No summary.");
  });

  it("prompts for a selection when there is no item", () => {
    const { lastFrame } = render(<DetailView item={null} />);
    expect(lastFrame()).toContain("Select an item to read it here.");
  });
});
