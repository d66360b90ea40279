/**
 * Raised when a current group claims more members of a prior group than
 * remain unattributed. Happens when a member id occurs in more than one
 * current group, or more than once within one.
 */
export class PartitionIntegrityError extends Error {
  readonly code = 'INTEGRITY_VIOLATION';

  constructor(
    readonly priorGroup: number,
    readonly currentGroup: number,
    readonly claimed: number,
    readonly remaining: number,
  ) {
    super(
      `Current group ${currentGroup} claims ${claimed} member(s) of prior group ${priorGroup}, ` +
        `but only ${remaining} remain unattributed`,
    );
    this.name = 'PartitionIntegrityError';
  }
}
