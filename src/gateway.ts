// ============================================================================
// Switchyard — Agent Gateway (WebSocket)
// ============================================================================
// Remote agents open a socket and must send a hello frame within the hello
// timeout. The hello registers the agent; every later frame goes through the
// delivery channel like any other connection's.
// ============================================================================

import { WebSocketServer } from "ws";
import type { RawData, WebSocket } from "ws";
import {
  CLOSE_CODE_CONFLICT,
  CLOSE_CODE_HELLO_TIMEOUT,
  CLOSE_CODE_PROTOCOL,
} from "./constants.js";
import type { Coordinator } from "./coordinator.js";
import { CoordinatorError, DuplicateActiveAgentError } from "./errors.js";
import { describeError, log } from "./logger.js";
import { decodeFrame, encodeFrame } from "./channel/protocol.js";
import type { HelloFrame } from "./channel/protocol.js";
import { WsConnection, rawToString, trimCloseReason } from "./channel/ws-connection.js";

export interface GatewayOptions {
  port: number;
  host?: string;
  helloTimeoutMs: number;
}

export class AgentGateway {
  private server: WebSocketServer | null = null;

  constructor(
    private coordinator: Coordinator,
    private options: GatewayOptions,
  ) { }

  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(): Promise<number> {
    if (this.server) return Promise.reject(new CoordinatorError("Gateway is already listening.", "GATEWAY_RUNNING"));

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port: this.options.port, host: this.options.host });
      this.server = server;

      server.once("error", (err) => {
        this.server = null;
        reject(err);
      });
      server.once("listening", () => {
        server.on("error", (err) => log.error("Gateway error", { message: err.message }));
        const address = server.address();
        const port = typeof address === "object" && address !== null ? address.port : this.options.port;
        log.info(`Agent gateway listening on port ${port}`);
        resolve(port);
      });
      server.on("connection", (socket) => this.handleSocket(socket));
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const client of server.clients) client.close(1001, "gateway shutting down");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    log.info("Agent gateway closed");
  }

  private handleSocket(socket: WebSocket): void {
    // ws reports malformed frames (bad UTF-8, oversized payloads) as socket errors.
    const onError = (err: Error) => log.warn("Agent socket error before hello", { message: err.message });
    socket.on("error", onError);

    const timer = setTimeout(() => {
      log.warn("Agent socket sent no hello in time");
      socket.close(CLOSE_CODE_HELLO_TIMEOUT, "hello timeout");
    }, this.options.helloTimeoutMs);

    socket.once("close", () => clearTimeout(timer));
    socket.once("message", (data: RawData, isBinary: boolean) => {
      clearTimeout(timer);
      this.handleHello(socket, data, isBinary, onError);
    });
  }

  private handleHello(socket: WebSocket, data: RawData, isBinary: boolean, onError: (err: Error) => void): void {
    if (isBinary) {
      this.refuse(socket, CLOSE_CODE_PROTOCOL, "PROTOCOL_ERROR", "Binary frames are not supported.");
      return;
    }

    let hello: HelloFrame;
    try {
      const frame = decodeFrame(rawToString(data));
      if (frame.type !== "hello") {
        this.refuse(socket, CLOSE_CODE_PROTOCOL, "PROTOCOL_ERROR", "The first frame must be hello.");
        return;
      }
      hello = frame;
    } catch (err) {
      const code = err instanceof CoordinatorError ? err.code : "PROTOCOL_ERROR";
      this.refuse(socket, CLOSE_CODE_PROTOCOL, code, describeError(err));
      return;
    }

    const { agentId, capabilities } = hello;
    // From here the connection logs socket errors with the agent id.
    const connection = new WsConnection(socket, agentId);
    socket.off("error", onError);
    this.coordinator.connectAgent(agentId, capabilities, connection).then(
      () => log.info("Agent joined through the gateway", { agentId }),
      (err: unknown) => {
        const closeCode = err instanceof DuplicateActiveAgentError ? CLOSE_CODE_CONFLICT : CLOSE_CODE_PROTOCOL;
        const code = err instanceof CoordinatorError ? err.code : "INTERNAL_ERROR";
        log.warn("Agent refused", { agentId, code, message: describeError(err) });
        this.refuse(socket, closeCode, code, describeError(err));
      },
    );
  }

  /** Send an error frame, then close the socket with `closeCode`. */
  private refuse(socket: WebSocket, closeCode: number, code: string, message: string): void {
    socket.send(encodeFrame({ type: "error", code, message }), () => {
      socket.close(closeCode, trimCloseReason(message));
    });
  }
}
