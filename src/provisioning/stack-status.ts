export type StackHealth = 'healthy' | 'in-progress' | 'failed' | 'deleted';

/**
 * Buckets a raw CloudFormation stack status.
 * A completed rollback counts as failed: the requested change did not land.
 */
export function classifyStackStatus(status: string): StackHealth {
  if (status.endsWith('_IN_PROGRESS')) {
    return 'in-progress';
  }
  if (status === 'DELETE_COMPLETE') {
    return 'deleted';
  }
  if (status.includes('ROLLBACK') || status.endsWith('_FAILED')) {
    return 'failed';
  }
  if (status.endsWith('_COMPLETE')) {
    return 'healthy';
  }
  return 'failed';
}

export function isTerminalStatus(status: string): boolean {
  return classifyStackStatus(status) !== 'in-progress';
}
