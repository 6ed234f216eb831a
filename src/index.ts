/**
 * OneNote page bridge: page content updates and cross-section transfer
 * over the Microsoft Graph API.
 *
 * createOneNoteService wires token manager, transport, page client and
 * transfer from a loaded Config. Tests and embedders can pass their own
 * transport or polling policy. Processes that want the configured log
 * level and JSONL log files call installLogging(config) first.
 */

import { createTokenManager, loadTokens, refreshAccessToken } from "./auth/tokens.js";
import type { Config } from "./config.js";
import { createGraphTransport, type Transport } from "./graph/transport.js";
import { createPageClient, type PageClient } from "./pages/client.js";
import { createPageTransfer, type PageTransfer, type TransferPolicy } from "./pages/transfer.js";

export interface OneNoteServiceOptions {
  transport?: Transport;
  policy?: Partial<TransferPolicy>;
}

export interface OneNoteService {
  pages: PageClient;
  transfer: PageTransfer;
}

export function createOneNoteService(config: Config, options: OneNoteServiceOptions = {}): OneNoteService {
  const transport = options.transport ?? createDefaultTransport(config);
  const pages = createPageClient({
    transport,
    graph: config.graph,
    logContent: config.logging.log_content,
  });
  const transfer = createPageTransfer({
    transport,
    graph: config.graph,
    policy: {
      maxAttempts: config.transfer.max_attempts,
      baseDelayMs: config.transfer.base_delay_ms,
      ...options.policy,
    },
    deletePage: (pageId) => pages.deletePage(pageId),
  });
  return { pages, transfer };
}

function createDefaultTransport(config: Config): Transport {
  const tokens = createTokenManager({
    tokens: loadTokens(config.auth.token_file),
    refresh: (refreshToken) => refreshAccessToken(config.auth, refreshToken),
    tokenFile: config.auth.token_file,
  });
  return createGraphTransport({ tokens, timeoutMs: config.graph.timeout_ms });
}

export { loadConfig, ensureDataDirs, type Config } from "./config.js";
export { createAppLogger, installConsoleFileLogging, installLogging, type AppLogger, type LogLevel } from "./logger.js";
export * from "./errors.js";
export {
  createTokenManager,
  loadTokens,
  saveTokens,
  refreshAccessToken,
  isExpired,
  type TokenManager,
  type TokenSet,
} from "./auth/tokens.js";
export {
  createGraphTransport,
  ensureSuccess,
  isSuccess,
  parseJsonBody,
  type HttpMethod,
  type Transport,
  type TransportResponse,
} from "./graph/transport.js";
export { sanitizeId, extractPageItemId, extractPageIdFromLocation } from "./graph/sanitize.js";
export {
  parseUpdateCommands,
  serializeCommands,
  toWireCommand,
  type UpdateAction,
  type UpdateCommand,
  type UpdatePosition,
  type WireCommand,
} from "./pages/commands.js";
export { validateTableUpdates } from "./pages/table-guardrail.js";
export {
  convertToHtml,
  detectContentFormat,
  escapeHtml,
  type ContentFormat,
  type ConvertedContent,
} from "./pages/content-format.js";
export { suggestValidName, validateDisplayName, ILLEGAL_NAME_CHARACTERS } from "./pages/display-name.js";
export {
  createResourceFetcher,
  findPageItems,
  summarizePageItem,
  type PageItemData,
  type PageItemInfo,
  type PageItemSummary,
} from "./pages/resources.js";
export { rewriteEmbeddedResources, type ResourcePart, type RewriteResult } from "./pages/rewriter.js";
export { assembleUpdatePayload, type UpdatePayload } from "./pages/multipart.js";
export { createPageClient, type PageClient, type UpdatePageResult } from "./pages/client.js";
export {
  createPageTransfer,
  jitterDelayMs,
  type AsyncOperation,
  type CopyResult,
  type MoveResult,
  type OperationStatus,
  type PageTransfer,
  type TransferPolicy,
} from "./pages/transfer.js";
