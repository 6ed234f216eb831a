/**
 * Copy and move of pages between sections.
 *
 * copyToSection is asynchronous on the Graph side: the submit answers 202
 * with an operation id, and the operation is polled until it completes,
 * fails or the attempt budget runs out. While a long copy is in progress
 * the status endpoint may answer 503; that counts as "still running".
 *
 * Move is copy followed by deleting the source. A failed delete does not
 * undo the copy; the result reports it instead.
 */

import type { GraphConfig } from "../config.js";
import { errorMessage, OperationTimeoutError, RemoteError } from "../errors.js";
import { extractPageIdFromLocation, sanitizeId } from "../graph/sanitize.js";
import { ensureSuccess, parseJsonBody, type Transport } from "../graph/transport.js";

export type OperationStatus = "NotStarted" | "Running" | "Completed" | "Failed";

export interface AsyncOperation {
  id: string;
  status: OperationStatus;
  /** URL of the new page; only on Completed. */
  resourceLocation?: string;
  /** Set when the status was synthesized rather than reported. */
  note?: string;
}

export interface TransferPolicy {
  maxAttempts: number;
  /** Unit of the jitter backoff between status checks. */
  baseDelayMs: number;
  sleep: (ms: number) => Promise<void>;
  /** Uniform in [0, 1). */
  random: () => number;
}

export interface CopyResult {
  /** Id of the new page. */
  id: string;
  operationId: string;
  /** Status checks made. */
  attempts: number;
}

export interface MoveResult extends CopyResult {
  sourceDeleted: boolean;
  warning?: string;
}

export interface TransferOptions {
  transport: Transport;
  graph: Pick<GraphConfig, "base_url" | "beta_url">;
  policy?: Partial<TransferPolicy>;
  /** Delete used by move. Defaults to DELETE on the page endpoint. */
  deletePage?: (pageId: string) => Promise<void>;
}

export interface PageTransfer {
  getOperation(operationId: string): Promise<AsyncOperation>;
  copyPage(pageId: string, targetSectionId: string): Promise<CopyResult>;
  movePage(pageId: string, targetSectionId: string): Promise<MoveResult>;
}

export const DEFAULT_TRANSFER_POLICY: TransferPolicy = {
  maxAttempts: 30,
  baseDelayMs: 1000,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
};

const STATUS_NAMES: Record<string, OperationStatus> = {
  notstarted: "NotStarted",
  running: "Running",
  completed: "Completed",
  failed: "Failed",
};

/**
 * Delay after status check number `attempt` (1-based):
 * baseDelayMs × (1 + randomInt(2 + attempt)), i.e. 1..(2+attempt) units.
 * The first sleep falls in 1..3 units.
 */
export function jitterDelayMs(attempt: number, policy: Pick<TransferPolicy, "baseDelayMs" | "random">): number {
  return policy.baseDelayMs * (1 + Math.floor(policy.random() * (2 + attempt)));
}

export function normalizeStatus(raw: string): OperationStatus {
  return STATUS_NAMES[raw.toLowerCase()] ?? "Running";
}

export function createPageTransfer(options: TransferOptions): PageTransfer {
  const { transport, graph } = options;
  const policy: TransferPolicy = { ...DEFAULT_TRANSFER_POLICY, ...options.policy };

  async function deleteSource(pageId: string): Promise<void> {
    if (options.deletePage) {
      return options.deletePage(pageId);
    }
    const response = await transport.request("DELETE", `${graph.base_url}/me/onenote/pages/${pageId}`);
    ensureSuccess(response, "DeletePage");
  }

  async function getOperation(operationId: string): Promise<AsyncOperation> {
    const id = sanitizeId(operationId, "operationID");
    const response = await transport.request("GET", `${graph.base_url}/me/onenote/operations/${id}`);

    if (response.status === 503) {
      return {
        id,
        status: "Running",
        note: "status endpoint returned 503 (service unavailable); the copy is still in progress",
      };
    }
    ensureSuccess(response, "GetOnenoteOperation");

    const data = parseJsonBody(response, "GetOnenoteOperation");
    if (typeof data.status !== "string") {
      throw new RemoteError("GetOnenoteOperation", response.status, response.body.toString("utf-8"), "response has no status");
    }
    return {
      id,
      status: normalizeStatus(data.status),
      ...(typeof data.resourceLocation === "string" ? { resourceLocation: data.resourceLocation } : {}),
    };
  }

  function newPageIdFrom(operation: AsyncOperation): string {
    if (!operation.resourceLocation) {
      throw new RemoteError("CopyPage", 0, "", `operation ${operation.id} completed without a resourceLocation`);
    }
    const pageId = extractPageIdFromLocation(operation.resourceLocation);
    if (!pageId) {
      throw new RemoteError(
        "CopyPage",
        0,
        "",
        `could not extract page id from resourceLocation: ${operation.resourceLocation}`,
      );
    }
    return sanitizeId(pageId, "extracted page ID");
  }

  async function copyPage(pageId: string, targetSectionId: string): Promise<CopyResult> {
    const id = sanitizeId(pageId, "pageID");
    const sectionId = sanitizeId(targetSectionId, "targetSectionID");

    const response = await transport.request(
      "POST",
      `${graph.beta_url}/me/onenote/pages/${id}/copyToSection`,
      JSON.stringify({ id: sectionId }),
      { "Content-Type": "application/json" },
    );
    if (response.status !== 202) {
      throw new RemoteError("CopyPage", response.status, response.body.toString("utf-8"));
    }

    const submitted = parseJsonBody(response, "CopyPage");
    if (typeof submitted.status !== "string" || typeof submitted.id !== "string" || !submitted.id) {
      throw new RemoteError("CopyPage", response.status, response.body.toString("utf-8"), "response is missing status or id");
    }
    const operationId = submitted.id;
    console.log(`[transfer] copy of page ${id} to section ${sectionId} submitted as operation ${operationId}`);

    for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
      const operation = await getOperation(operationId);
      if (operation.note) {
        console.log(`[transfer] operation ${operationId}: ${operation.note}`);
      }

      if (operation.status === "Completed") {
        const newId = newPageIdFrom(operation);
        console.log(`[transfer] operation ${operationId} completed, new page ${newId}`);
        return { id: newId, operationId, attempts: attempt + 1 };
      }
      if (operation.status === "Failed") {
        throw new RemoteError("CopyPage", 0, "", `operation ${operationId} failed`);
      }

      if (attempt < policy.maxAttempts - 1) {
        await policy.sleep(jitterDelayMs(attempt + 1, policy));
      }
    }

    throw new OperationTimeoutError(operationId, policy.maxAttempts);
  }

  return {
    getOperation,
    copyPage,

    async movePage(pageId, targetSectionId) {
      const copied = await copyPage(pageId, targetSectionId);
      const sourceId = sanitizeId(pageId, "pageID");

      try {
        await deleteSource(sourceId);
      } catch (error) {
        const warning = `page copied to ${copied.id} but the source page ${sourceId} could not be deleted: ${errorMessage(error)}`;
        console.warn(`[transfer] ${warning}`);
        return { ...copied, sourceDeleted: false, warning };
      }

      console.log(`[transfer] moved page ${sourceId} to ${copied.id}`);
      return { ...copied, sourceDeleted: true };
    },
  };
}
