import { describe, expect, it } from "vitest";
import {
  accessibilityIssueColumn,
  summarizeAccessibility,
} from "./summarizeAccessibility";

describe("accessibilityIssueColumn", () => {
  it("prefers a column named after the issue", () => {
    expect(accessibilityIssueColumn(["URL", "Priority", "Violation"])).toBe(
      "Violation"
    );
    expect(accessibilityIssueColumn(["URL", "Issue Name"])).toBe("Issue Name");
  });

  it("falls back to the second column", () => {
    expect(accessibilityIssueColumn(["URL", "Rule", "Priority"])).toBe("Rule");
    expect(accessibilityIssueColumn(["URL"])).toBeUndefined();
  });
});

describe("summarizeAccessibility", () => {
  it("counts violations and distinct pages, most frequent first", () => {
    const rows = [
      ["a", "Zoom"],
      ["a", "Contrast"],
      ["b", "Alt"],
      ["a", "Contrast"],
      ["b", "Labels"],
      ["b", "Zoom"],
      ["b", "Alt"],
      ["b", "Contrast"],
      ["c", "nan"],
    ].map(([page, issue]) => ({
      URL: `https://example.com/${page}`,
      Issue: issue ?? "",
    }));

    expect(summarizeAccessibility({ columns: ["URL", "Issue"], rows })).toEqual({
      columns: ["Issue", "Count", "Pages Affected"],
      rows: [
        { Issue: "Contrast", Count: 3, "Pages Affected": 2 },
        { Issue: "Alt", Count: 2, "Pages Affected": 1 },
        { Issue: "Zoom", Count: 2, "Pages Affected": 2 },
        { Issue: "Labels", Count: 1, "Pages Affected": 1 },
      ],
    });
  });
});
