import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  JSONRPCMessageSchema,
  type JSONRPCMessage,
} from "@modelcontextprotocol/sdk/types.js";

type RequestId = string | number;

const REQUEST_TIMEOUT_MS = 60_000;

const SERVER_ERROR = -32000;
const INVALID_REQUEST = -32600;

function errorResponse(
  id: RequestId,
  message: string,
  code: number = SERVER_ERROR,
): JSONRPCMessage {
  return {
    jsonrpc: "2.0",
    id,
    error: { code, message },
  };
}

function idOf(message: JSONRPCMessage): RequestId | undefined {
  const id: unknown = "id" in message ? message.id : undefined;
  return typeof id === "string" || typeof id === "number" ? id : undefined;
}

/**
 * Request-driven MCP transport for Hono.
 *
 * Each JSON-RPC request posted over HTTP is dispatched to the server and
 * resolved with the matching response. Notifications get no response.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<RequestId, (response: JSONRPCMessage) => void>();

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(private readonly timeoutMs = REQUEST_TIMEOUT_MS) {}

  async start(): Promise<void> {
    // Nothing to open; messages arrive through handleJsonRpc
  }

  async close(): Promise<void> {
    for (const [id, resolve] of this.pendingResponses) {
      resolve(errorResponse(id, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // Route responses back to the waiting HTTP request; server-initiated
    // notifications have nowhere to go in this mode.
    if (!("result" in message) && !("error" in message)) return;
    const id = idOf(message);
    if (id === undefined) return;

    const resolver = this.pendingResponses.get(id);
    if (resolver) {
      this.pendingResponses.delete(id);
      resolver(message);
    }
  }

  /** Validate an HTTP body as a single JSON-RPC message. */
  static parse(body: unknown): JSONRPCMessage | null {
    const parsed = JSONRPCMessageSchema.safeParse(body);
    return parsed.success ? parsed.data : null;
  }

  /**
   * Dispatch one JSON-RPC message. Resolves with the response for a
   * request, or null for a notification. A request whose id is already
   * in flight is rejected without being dispatched.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    const id = "method" in body ? idOf(body) : undefined;
    if (id === undefined) {
      this.onmessage?.(body);
      return null;
    }

    if (this.pendingResponses.has(id)) {
      return errorResponse(id, "Duplicate request id", INVALID_REQUEST);
    }

    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(errorResponse(id, "Request timed out"));
        }
      }, this.timeoutMs);
      timer.unref();

      // Register before dispatching so a synchronous reply is not lost
      this.pendingResponses.set(id, (response) => {
        clearTimeout(timer);
        resolve(response);
      });

      this.onmessage?.(body);
    });
  }
}
