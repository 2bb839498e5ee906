import type { StageName } from './stages.js';
import type { StageStatus } from './types.js';

export class IllegalTransitionError extends Error {
  readonly type = 'illegal_transition';

  constructor(
    readonly itemId: string,
    readonly stage: StageName,
    readonly from: StageStatus | null,
    readonly to: StageStatus
  ) {
    super(`Illegal transition for ${itemId}/${stage}: ${from ?? 'absent'} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class ArtifactNotFoundError extends Error {
  readonly type = 'artifact_not_found';

  constructor(readonly artifactId: string) {
    super(`Artifact not found: ${artifactId}`);
    this.name = 'ArtifactNotFoundError';
  }
}

export class ArtifactIntegrityError extends Error {
  readonly type = 'artifact_integrity';

  constructor(readonly artifactId: string, readonly actual: string) {
    super(`Artifact ${artifactId} failed hash verification (got ${actual})`);
    this.name = 'ArtifactIntegrityError';
  }
}
