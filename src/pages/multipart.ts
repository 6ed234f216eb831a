/**
 * Multipart body for the page content PATCH: a "commands" JSON part first,
 * then one binary part per rewritten resource, named by its content id.
 */

import { errorMessage, ValidationError } from "../errors.js";
import { serializeCommands, type UpdateCommand } from "./commands.js";
import type { ResourcePart } from "./rewriter.js";

export interface UpdatePayload {
  body: Buffer;
  /** multipart/form-data with its boundary. */
  contentType: string;
}

export async function assembleUpdatePayload(
  commands: readonly UpdateCommand[],
  parts: readonly ResourcePart[],
): Promise<UpdatePayload> {
  let json: string;
  try {
    json = serializeCommands(commands);
  } catch (error) {
    throw new ValidationError(`failed to serialize update commands: ${errorMessage(error)}`);
  }

  const form = new FormData();
  form.append("commands", new Blob([json], { type: "application/json" }), "commands.json");

  for (const part of parts) {
    try {
      form.append(part.contentId, new Blob([new Uint8Array(part.content)], { type: part.contentType }), part.filename);
    } catch (error) {
      console.warn(`[pages] skipping resource part ${part.contentId}: ${errorMessage(error)}`);
    }
  }

  const encoded = new Response(form);
  const contentType = encoded.headers.get("content-type") ?? "multipart/form-data";
  return { body: Buffer.from(await encoded.arrayBuffer()), contentType };
}
