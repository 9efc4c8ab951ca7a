import { UninstallBlockedError } from '@core/errors/UninstallBlockedError';
import { BLOCK_CAPABILITY, type IDocumentStore } from '@core/types/document';
import { configLogger as logger } from '@core/utils/logger';

/**
 * Install-time checks around the block engine.
 */
export class LifecycleService {
  constructor(private readonly store: IDocumentStore) {}

  async dependentFields(): Promise<string[]> {
    return this.store.findFieldsByCapability(BLOCK_CAPABILITY);
  }

  /**
   * @throws {UninstallBlockedError} naming every field that still has block processing enabled
   */
  async assertCanUninstall(): Promise<void> {
    const fields = await this.dependentFields();
    if (fields.length > 0) {
      logger.error('Uninstall refused', { dependentFields: fields });
      throw new UninstallBlockedError(fields);
    }
  }
}
