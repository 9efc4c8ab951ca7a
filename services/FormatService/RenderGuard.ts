import type { RenderScope } from '@core/types/block';
import { formatLogger as logger } from '@core/utils/logger';

/**
 * Reentrancy flag for one logical render. Create one per request; sharing a
 * guard between concurrent renders makes them skip each other.
 */
export class RenderGuard implements RenderScope {
  private inProgress = false;

  get active(): boolean {
    return this.inProgress;
  }

  /**
   * @returns false when the render is already in progress
   */
  enter(): boolean {
    if (this.inProgress) {
      logger.debug('Nested format call skipped');
      return false;
    }
    this.inProgress = true;
    return true;
  }

  exit(): void {
    if (!this.inProgress) {
      logger.warn('Attempted to leave a render that was not entered');
      return;
    }
    this.inProgress = false;
  }
}
