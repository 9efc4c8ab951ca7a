/**
 * Error codes for textblocks operations
 */
export enum BlocksErrorCode {
  CONFIG_INVALID = 'E_CONFIG_INVALID',
  BLOCK_RESOLUTION_FAILED = 'E_BLOCK_RESOLUTION_FAILED',
  STORE_FAILED = 'E_STORE_FAILED',
  UNINSTALL_BLOCKED = 'E_UNINSTALL_BLOCKED'
}
