/**
 * Console inbox for local testing: no WhatsApp connection.
 * Each stdin line `<user>: <text>` is treated as an inbound text message from that user;
 * the reply is printed as `<user> <= <reply>`.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

export interface InboundMessage {
  userId: string;
  text: string;
}

export type InboundHandler = (message: InboundMessage) => Promise<string | null>;

export interface ConsoleInboxConfig {
  input?: Readable;
  output?: Writable;
  /** User id for lines without a `<user>:` prefix. */
  defaultUserId?: string;
}

export function parseInboundLine(line: string, defaultUserId: string): InboundMessage | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const sep = trimmed.indexOf(":");
  if (sep > 0) {
    const userId = trimmed.slice(0, sep).trim();
    const text = trimmed.slice(sep + 1).trim();
    if (userId && text) return { userId, text };
    return null;
  }
  return { userId: defaultUserId, text: trimmed };
}

export class ConsoleInbox {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly defaultUserId: string;

  constructor(config: ConsoleInboxConfig = {}) {
    this.input = config.input ?? process.stdin;
    this.output = config.output ?? process.stdout;
    this.defaultUserId = config.defaultUserId ?? "console";
  }

  /** Process lines one at a time until the input ends. */
  async run(handler: InboundHandler): Promise<void> {
    const rl = createInterface({ input: this.input, crlfDelay: Infinity });
    for await (const line of rl) {
      const message = parseInboundLine(line, this.defaultUserId);
      if (!message) continue;
      const reply = await handler(message);
      if (reply) this.output.write(`${message.userId} <= ${reply}\n`);
    }
  }
}
