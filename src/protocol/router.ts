import { type Logger, logger as rootLogger } from "../logger.js";
import { emitMetric, type MetricsSink, noopMetrics } from "../metrics.js";
import { isPriority, StatusCode } from "../schemas/protocol.js";
import { isJsonObject } from "./content-handlers.js";
import { ProtocolError } from "./errors.js";
import { Mailbox } from "./mailbox.js";
import {
  cloneMessage,
  createErrorMessage,
  createResponseMessage,
  isMessage,
  isMessageExpired,
  validateMessage,
} from "./message.js";
import {
  BROADCAST,
  type JsonObject,
  type Message,
  type MessageContent,
} from "./types.js";

/** Sender id used for messages the router itself emits. */
export const ROUTER_ID = "router";

export type AgentInfo = JsonObject;
export type AgentStatus = "active" | "inactive";

/** What a handler may return: a full message, reply content, or nothing. */
export type HandlerResult = Message | MessageContent | undefined;

export type MessageHandler = (
  message: Message,
) => HandlerResult | Promise<HandlerResult> | void | Promise<void>;

export interface AgentEntry {
  id: string;
  info: AgentInfo;
  status: AgentStatus;
  registered_at: string;
  last_heartbeat: string;
  delivery: "mailbox" | "handler";
}

interface AgentSlot {
  id: string;
  info: AgentInfo;
  status: AgentStatus;
  registered_at: string;
  last_heartbeat: string;
  mailbox?: Mailbox;
  handler?: MessageHandler;
}

export interface RoutingStats {
  total_agents: number;
  active_agents: number;
  queued: number;
  delivered: number;
  failed: number;
  handled: number;
  rejected: number;
  expired: number;
  heartbeats: number;
  broadcasts: number;
}

type Counter = Exclude<
  keyof RoutingStats,
  "total_agents" | "active_agents" | "queued"
>;

export interface MessageRouterOpts {
  logger?: Logger;
  metrics?: MetricsSink;
}

export interface RegisterOpts {
  /** Push delivery. Agents without a handler get a mailbox. */
  handler?: MessageHandler;
}

function isReply(value: unknown): value is Message | MessageContent {
  return typeof value === "string" || isJsonObject(value);
}

/**
 * In-process router: resolves recipients (literal ids or the broadcast
 * sentinel) and delivers copies into mailboxes or to handlers.
 *
 * routeMessage() never throws. Failures are logged, counted and reported
 * through the boolean result.
 */
export class MessageRouter {
  private agents = new Map<string, AgentSlot>();
  private counters: Record<Counter, number> = {
    delivered: 0,
    failed: 0,
    handled: 0,
    rejected: 0,
    expired: 0,
    heartbeats: 0,
    broadcasts: 0,
  };
  private readonly log: Logger;
  private readonly metrics: MetricsSink;

  constructor(opts: MessageRouterOpts = {}) {
    this.log = (opts.logger ?? rootLogger).child({ module: "router" });
    this.metrics = opts.metrics ?? noopMetrics;
  }

  /**
   * Register (or re-register) an agent. Re-registering updates its info
   * and delivery mode and keeps any queued messages.
   */
  registerAgent(
    agentId: string,
    info: AgentInfo = {},
    opts: RegisterOpts = {},
  ): void {
    if (agentId.trim() === "") {
      throw new ProtocolError("ROUTING_ERROR", "Agent id is required");
    }
    if (agentId === BROADCAST || agentId === ROUTER_ID) {
      throw new ProtocolError(
        "ROUTING_ERROR",
        `Agent id "${agentId}" is reserved`,
        { agent_id: agentId },
      );
    }

    const now = new Date().toISOString();
    const existing = this.agents.get(agentId);
    const slot: AgentSlot = existing ?? {
      id: agentId,
      info,
      status: "active",
      registered_at: now,
      last_heartbeat: now,
    };
    slot.info = info;
    slot.status = "active";
    slot.last_heartbeat = now;
    slot.handler = opts.handler;
    if (!slot.handler && !slot.mailbox) {
      slot.mailbox = new Mailbox(agentId);
    }
    this.agents.set(agentId, slot);

    this.log.info(
      { agent_id: agentId, delivery: slot.handler ? "handler" : "mailbox" },
      existing ? "Agent re-registered" : "Agent registered",
    );
  }

  /**
   * Remove an agent. Its mailbox is closed (waiting receivers get null);
   * copies already delivered elsewhere are unaffected.
   */
  unregisterAgent(agentId: string): boolean {
    const slot = this.agents.get(agentId);
    if (!slot) return false;

    slot.mailbox?.close();
    this.agents.delete(agentId);
    this.log.info({ agent_id: agentId }, "Agent unregistered");
    return true;
  }

  isRegistered(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  getAgentInfo(agentId: string): AgentEntry | undefined {
    const slot = this.agents.get(agentId);
    return slot ? this.toEntry(slot) : undefined;
  }

  listAgents(): AgentEntry[] {
    return [...this.agents.values()].map((slot) => this.toEntry(slot));
  }

  listActiveAgents(): string[] {
    return [...this.agents.values()]
      .filter((slot) => slot.status === "active")
      .map((slot) => slot.id);
  }

  markInactive(agentId: string): boolean {
    const slot = this.agents.get(agentId);
    if (!slot) return false;
    slot.status = "inactive";
    return true;
  }

  async routeMessage(message: Message): Promise<boolean> {
    try {
      const errors = validateMessage(message);
      if (errors.length > 0) {
        this.count("rejected");
        this.log.warn(
          { message_id: message.id, errors },
          "Message validation failed",
        );
        this.notifyFormatError(message, errors);
        return false;
      }

      if (isMessageExpired(message)) {
        this.count("expired");
        this.log.warn(
          { message_id: message.id, expires_at: message.expires_at },
          "Message expired before routing",
        );
        return false;
      }

      switch (message.message_type) {
        case "heartbeat":
          return this.handleHeartbeat(message);
        case "discovery":
          return await this.handleDiscovery(message);
        default:
          return await this.routeToRecipients(message);
      }
    } catch (err) {
      this.count("failed");
      this.log.error({ err, message_id: message.id }, "Routing failed");
      return false;
    }
  }

  /**
   * Wait for the next message in an agent's mailbox.
   * Resolves null on timeout.
   * @throws ProtocolError when the agent is unknown or uses a handler
   */
  receive(agentId: string, timeoutMs?: number): Promise<Message | null> {
    return this.mailboxFor(agentId).receive(timeoutMs);
  }

  tryReceive(agentId: string): Message | null {
    return this.mailboxFor(agentId).tryReceive();
  }

  pendingCount(agentId: string): number {
    return this.agents.get(agentId)?.mailbox?.size ?? 0;
  }

  getRoutingStats(): RoutingStats {
    let queued = 0;
    for (const slot of this.agents.values()) {
      queued += slot.mailbox?.size ?? 0;
    }
    return {
      total_agents: this.agents.size,
      active_agents: this.listActiveAgents().length,
      queued,
      ...this.counters,
    };
  }

  /** Close every mailbox and forget all agents. */
  shutdown(): void {
    for (const slot of this.agents.values()) {
      slot.mailbox?.close();
    }
    this.agents.clear();
    this.log.info("Router shut down");
  }

  private mailboxFor(agentId: string): Mailbox {
    const slot = this.agents.get(agentId);
    if (!slot) {
      throw new ProtocolError(
        "AGENT_NOT_FOUND",
        `Agent ${agentId} not found`,
        { agent_id: agentId },
      );
    }
    if (!slot.mailbox) {
      throw new ProtocolError(
        "ROUTING_ERROR",
        `Agent ${agentId} receives through a handler`,
        { agent_id: agentId },
      );
    }
    return slot.mailbox;
  }

  private handleHeartbeat(message: Message): boolean {
    const slot = this.agents.get(message.sender);
    if (slot) {
      slot.last_heartbeat = new Date().toISOString();
      slot.status = "active";
    }
    this.count("heartbeats");
    return true;
  }

  private async handleDiscovery(message: Message): Promise<boolean> {
    const slot = this.agents.get(message.sender);
    if (!slot) {
      this.count("failed");
      this.log.warn(
        { message_id: message.id, sender: message.sender },
        "Discovery from unregistered agent",
      );
      return false;
    }

    const response = createResponseMessage(
      message,
      {
        agents: this.listAgents().map((a) => ({
          id: a.id,
          info: a.info,
          status: a.status,
        })),
      },
      { sender: ROUTER_ID },
    );
    await this.deliver(slot, response);
    return true;
  }

  private async routeToRecipients(message: Message): Promise<boolean> {
    const targets = new Set<string>();
    let allKnown = true;

    for (const recipient of message.recipients) {
      if (recipient === BROADCAST) {
        this.count("broadcasts");
        for (const id of this.agents.keys()) {
          if (id !== message.sender) targets.add(id);
        }
        continue;
      }
      if (this.agents.has(recipient)) {
        targets.add(recipient);
      } else {
        allKnown = false;
        this.count("failed");
        this.log.warn(
          { message_id: message.id, recipient },
          "Recipient not found",
        );
      }
    }

    for (const id of targets) {
      const slot = this.agents.get(id);
      if (slot) await this.deliver(slot, message);
    }

    return allKnown;
  }

  private async deliver(slot: AgentSlot, message: Message): Promise<void> {
    const copy = cloneMessage(message);

    if (slot.handler) {
      let result: unknown;
      try {
        result = await slot.handler(copy);
      } catch (err) {
        this.count("failed");
        this.log.error(
          { err, agent_id: slot.id, message_id: message.id },
          "Message handler failed",
        );
        return;
      }
      this.count("delivered");
      this.count("handled");

      const repliable =
        message.message_type !== "response" && message.message_type !== "error";
      if (repliable && isReply(result)) {
        await this.routeReply(slot.id, message, result);
      }
      return;
    }

    if (slot.mailbox?.push(copy)) {
      this.count("delivered");
      this.log.debug(
        { message_id: message.id, recipient: slot.id },
        "Message queued",
      );
      return;
    }

    this.count("failed");
    this.log.warn(
      { message_id: message.id, recipient: slot.id },
      "Mailbox closed",
    );
  }

  private async routeReply(
    responder: string,
    original: Message,
    result: Message | MessageContent,
  ): Promise<void> {
    const reply = isMessage(result)
      ? result
      : createResponseMessage(original, result, { sender: responder });
    const routed = await this.routeMessage(reply);
    if (!routed) {
      this.log.warn(
        { message_id: original.id, reply_id: reply.id, responder },
        "Handler reply could not be routed",
      );
    }
  }

  private notifyFormatError(message: Message, errors: string[]): void {
    if (message.message_type === "error") return;
    const slot =
      typeof message.sender === "string"
        ? this.agents.get(message.sender)
        : undefined;
    if (!slot?.mailbox || slot.handler) return;

    const error = createErrorMessage(
      message,
      StatusCode.MESSAGE_FORMAT_ERROR,
      errors.join("; "),
      { sender: ROUTER_ID },
    );
    if (!isPriority(error.priority)) error.priority = 2;
    if (slot.mailbox.push(error)) this.count("delivered");
  }

  private toEntry(slot: AgentSlot): AgentEntry {
    return {
      id: slot.id,
      info: slot.info,
      status: slot.status,
      registered_at: slot.registered_at,
      last_heartbeat: slot.last_heartbeat,
      delivery: slot.handler ? "handler" : "mailbox",
    };
  }

  private count(counter: Counter): void {
    this.counters[counter] += 1;
    emitMetric(this.metrics, this.log, `router.${counter}`);
  }
}
