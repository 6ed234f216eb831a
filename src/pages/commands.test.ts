import { describe, it, expect } from "vitest";
import { parseUpdateCommands, serializeCommands, toWireCommand, type UpdateCommand } from "./commands.js";
import { ValidationError } from "../errors.js";

describe("toWireCommand", () => {
  it("never gives append a position", () => {
    const wire = toWireCommand({ target: "body", action: "append", position: "before", content: "<p>x</p>" });
    expect(wire).toEqual({ target: "body", action: "append", content: "<p>x</p>" });
    expect("position" in wire).toBe(false);
  });

  it("always gives the other actions a position", () => {
    const actions = ["prepend", "insert", "replace", "delete"] as const;
    for (const action of actions) {
      const wire = toWireCommand({ target: "#p1", action, content: "<p>x</p>" });
      expect("position" in wire).toBe(true);
    }
  });

  it("defaults position to after and keeps an explicit one", () => {
    expect(toWireCommand({ target: "title", action: "replace", content: "New" })).toEqual({
      target: "title",
      action: "replace",
      position: "after",
      content: "New",
    });
    expect(toWireCommand({ target: "#p1", action: "insert", position: "before", content: "<p>a</p>" })).toEqual({
      target: "#p1",
      action: "insert",
      position: "before",
      content: "<p>a</p>",
    });
  });

  it("drops content from delete", () => {
    expect(toWireCommand({ target: "#p1", action: "delete", content: "ignored" })).toEqual({
      target: "#p1",
      action: "delete",
      position: "after",
    });
  });
});

describe("serializeCommands", () => {
  it("writes the JSON array in wire form", () => {
    const commands: UpdateCommand[] = [
      { target: "body", action: "append", content: "<p>a</p>" },
      { target: "title", action: "replace", content: "New" },
    ];
    expect(serializeCommands(commands)).toBe(
      '[{"target":"body","action":"append","content":"<p>a</p>"},' +
        '{"target":"title","action":"replace","position":"after","content":"New"}]',
    );
  });
});

describe("parseUpdateCommands", () => {
  it("parses a JSON string", () => {
    const commands = parseUpdateCommands('[{"target":"body","action":"append","content":"<p>hi</p>"}]');
    expect(commands).toEqual([{ target: "body", action: "append", content: "<p>hi</p>" }]);
  });

  it("accepts delete without content", () => {
    expect(parseUpdateCommands([{ target: "#p1", action: "delete" }])).toEqual([{ target: "#p1", action: "delete" }]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseUpdateCommands("[{")).toThrow(/^commands are not valid JSON/);
  });

  it("rejects non-arrays", () => {
    expect(() => parseUpdateCommands({ target: "body" })).toThrow("commands must be a JSON array");
  });

  it("lists every problem with its index", () => {
    let caught: unknown;
    try {
      parseUpdateCommands([
        { target: "body", action: "replace" },
        { target: "body", action: "explode", content: "x" },
        { target: "  ", action: "append", content: "x" },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    const message = caught instanceof Error ? caught.message : "";
    expect(message).toContain('command 0: content is required for action "replace"');
    expect(message).toContain("command 1: /action");
    expect(message).toContain("command 2: target cannot be empty");
  });
});
