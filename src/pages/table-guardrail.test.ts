import { describe, it, expect } from "vitest";
import { isTablePartTarget, validateTableUpdates } from "./table-guardrail.js";
import { TableUpdateError } from "../errors.js";

describe("validateTableUpdates", () => {
  it("allows whole-table and non-table targets", () => {
    expect(() =>
      validateTableUpdates([
        { target: "table:t1", action: "replace", content: "<table></table>" },
        { target: "body", action: "append", content: "<p>x</p>" },
        { target: "#td-like-id", action: "replace", content: "<p>x</p>" },
      ]),
    ).not.toThrow();
  });

  it("rejects cell, header cell and row targets and lists all of them", () => {
    let caught: unknown;
    try {
      validateTableUpdates([
        { target: "td:c1", action: "replace", content: "<td>1</td>" },
        { target: "body", action: "append", content: "<p>x</p>" },
        { target: "th:h1", action: "replace", content: "<th>h</th>" },
        { target: "tr:r2", action: "delete" },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TableUpdateError);
    if (!(caught instanceof TableUpdateError)) return;
    expect(caught.targets).toEqual(["td:c1", "th:h1", "tr:r2"]);
    expect(caught.kind).toBe("validation");
    expect(caught.message).toContain("individual table elements (td:c1, th:h1, tr:r2)");
    expect(caught.message).toContain("Target the entire table element (table:{table-data-id})");
  });

  it("matches prefixes only", () => {
    expect(isTablePartTarget("td:1")).toBe(true);
    expect(isTablePartTarget("table:1")).toBe(false);
    expect(isTablePartTarget("#td:1")).toBe(false);
  });
});
