import type { IWarningReporter } from '@core/types/document';

/**
 * Keeps user-facing warnings until the caller shows them.
 */
export class CollectingWarningReporter implements IWarningReporter {
  private messages: string[] = [];

  warn(message: string): void {
    this.messages.push(message);
  }

  drain(): string[] {
    const drained = this.messages;
    this.messages = [];
    return drained;
  }
}
