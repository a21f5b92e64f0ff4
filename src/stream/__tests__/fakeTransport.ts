import { IStreamTransport } from "../../types/stream.types";
import { KEEPALIVE_PING } from "../../utils/constants";

/** In-process stand-in for a WebSocket; tests drive it with emit*(). */
export class FakeTransport implements IStreamTransport {
  sent: string[] = [];
  closed = false;
  private open = false;
  private openCbs: (() => void)[] = [];
  private messageCbs: ((text: string) => void)[] = [];
  private closeCbs: ((code: number, reason: string) => void)[] = [];
  private errorCbs: ((err: Error) => void)[] = [];

  constructor(readonly url: string) {}

  onOpen(cb: () => void): void {
    this.openCbs.push(cb);
  }

  onMessage(cb: (text: string) => void): void {
    this.messageCbs.push(cb);
  }

  onClose(cb: (code: number, reason: string) => void): void {
    this.closeCbs.push(cb);
  }

  onError(cb: (err: Error) => void): void {
    this.errorCbs.push(cb);
  }

  send(text: string): void {
    this.sent.push(text);
  }

  close(): void {
    this.open = false;
    this.closed = true;
  }

  isOpen(): boolean {
    return this.open;
  }

  emitOpen(): void {
    this.open = true;
    for (const cb of this.openCbs) cb();
  }

  emitMessage(payload: unknown): void {
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    for (const cb of this.messageCbs) cb(text);
  }

  emitClose(code = 1006, reason = "abnormal closure"): void {
    this.open = false;
    for (const cb of this.closeCbs) cb(code, reason);
  }

  emitError(err: Error): void {
    for (const cb of this.errorCbs) cb(err);
  }

  /** Sent frames other than keepalive pings, parsed. */
  sentJson(): unknown[] {
    return this.sent.filter((s) => s !== KEEPALIVE_PING).map((s) => JSON.parse(s));
  }
}

/** Let pending promise continuations run. */
export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}
