import type { NotificationMessage, NotificationSink } from "../ports.js";

export class ConsoleSink implements NotificationSink {
  readonly name = "console";

  constructor(private readonly write: (line: string) => void = (line) => console.error(line)) {}

  async send(message: NotificationMessage): Promise<void> {
    const link = message.link ? ` (${message.link})` : "";
    this.write(`[notify:${message.point}] ${message.message}${link}`);
  }
}
