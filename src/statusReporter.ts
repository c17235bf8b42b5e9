/**
 * Status Line
 *
 * Holds the message shown in the status area. One instance is created by
 * the application root and handed to every component that reports status.
 * Only continuations (foreground code) should call show().
 */

import { toDisposable } from './lifecycle';
import type { IDisposable } from './lifecycle';
import type { OutputChannel } from './outputChannel';

export interface StatusMessage {
  readonly text: string;
  readonly error: boolean;
}

export class StatusReporter {
  private message: StatusMessage = { text: '', error: false };
  private readonly listeners = new Set<(message: StatusMessage) => void>();

  constructor(private readonly channel?: OutputChannel) {}

  get current(): StatusMessage {
    return this.message;
  }

  show(text: string, options: { error?: boolean } = {}): void {
    this.message = { text, error: options.error ?? false };
    this.channel?.appendLine(`${this.message.error ? 'ERROR' : 'STATUS'}: ${text}`);
    for (const listener of this.listeners) {
      listener(this.message);
    }
  }

  /**
   * Subscribe to status changes.
   */
  onDidChange(listener: (message: StatusMessage) => void): IDisposable {
    this.listeners.add(listener);
    return toDisposable(() => this.listeners.delete(listener));
  }
}
