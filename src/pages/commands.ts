/**
 * Page update commands and their wire form.
 *
 * The PATCH content endpoint takes a JSON array of
 * {target, action, position?, content?}. `append` must never carry a
 * position, so serialization picks one of two explicit shapes by action
 * instead of dropping fields conditionally.
 */

import type { Static } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ValidationError } from "../errors.js";

export const updateActionSchema = Type.Union([
  Type.Literal("append"),
  Type.Literal("prepend"),
  Type.Literal("insert"),
  Type.Literal("replace"),
  Type.Literal("delete"),
]);

export const updatePositionSchema = Type.Union([Type.Literal("before"), Type.Literal("after")]);

export const updateCommandSchema = Type.Object({
  target: Type.String({
    description: 'Element to change: "body", "title", "#{data-id}", "{generated-id}" or "table:{data-id}"',
  }),
  action: updateActionSchema,
  position: Type.Optional(updatePositionSchema),
  content: Type.Optional(Type.String({ description: "HTML fragment. Omitted for delete." })),
});

export type UpdateAction = Static<typeof updateActionSchema>;
export type UpdatePosition = Static<typeof updatePositionSchema>;
export type UpdateCommand = Static<typeof updateCommandSchema>;

/** Wire shape for append: no position key at all. */
export interface AppendWireCommand {
  target: string;
  action: "append";
  content: string;
}

/** Wire shape for every other action: position always present. */
export interface PositionedWireCommand {
  target: string;
  action: Exclude<UpdateAction, "append">;
  position: UpdatePosition;
  content?: string;
}

export type WireCommand = AppendWireCommand | PositionedWireCommand;

/** Position the API applies when none is given. */
const DEFAULT_POSITION: UpdatePosition = "after";

/**
 * Validate untyped input (a JSON string or an already-parsed value) into
 * update commands. Every problem is reported with its command index.
 */
export function parseUpdateCommands(input: unknown): UpdateCommand[] {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new ValidationError(`commands are not valid JSON: ${String(error)}`);
    }
  }

  if (!Array.isArray(value)) {
    throw new ValidationError("commands must be a JSON array");
  }

  const problems: string[] = [];
  const commands: UpdateCommand[] = [];

  value.forEach((item: unknown, index) => {
    if (!Value.Check(updateCommandSchema, item)) {
      for (const err of Value.Errors(updateCommandSchema, item)) {
        problems.push(`command ${index}: ${err.path || "/"} ${err.message}`);
      }
      return;
    }
    if (!item.target.trim()) {
      problems.push(`command ${index}: target cannot be empty`);
    }
    if (item.action !== "delete" && !item.content) {
      problems.push(`command ${index}: content is required for action "${item.action}"`);
    }
    commands.push(item);
  });

  if (problems.length > 0) {
    throw new ValidationError(`invalid update commands:\n  - ${problems.join("\n  - ")}`);
  }
  return commands;
}

export function toWireCommand(command: UpdateCommand): WireCommand {
  if (command.action === "append") {
    return { target: command.target, action: "append", content: command.content ?? "" };
  }

  const wire: PositionedWireCommand = {
    target: command.target,
    action: command.action,
    position: command.position ?? DEFAULT_POSITION,
  };
  if (command.action !== "delete" && command.content !== undefined) {
    wire.content = command.content;
  }
  return wire;
}

export function serializeCommands(commands: readonly UpdateCommand[]): string {
  return JSON.stringify(commands.map(toWireCommand));
}
