import type { Logger } from '@contextpack/shared';
import type { RepoScanner } from './scanner';

/**
 * Collaborators shared by the pipeline stages. One scanner per run lets the
 * stages reuse each other's directory walks.
 */
export interface StageDeps {
  scanner: RepoScanner;
  logger: Logger;
}
