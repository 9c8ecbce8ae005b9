/**
 * IConfirmationProvider Interface
 *
 * Port interface for the gate in front of every live mutation (create, set,
 * rename, delete). Batch runs approve everything; interactive runs ask.
 */

export interface IConfirmationProvider {
  /**
   * Approve or decline one pending mutation.
   *
   * @param description - Human readable description of the change
   */
  confirm(description: string): Promise<boolean>;
}

/**
 * Approves every mutation.
 */
export const autoApprove: IConfirmationProvider = {
  confirm: async () => true,
};

/**
 * Declines every mutation and keeps the descriptions, producing a plan of
 * what an approving run would have attempted.
 */
export class PlanRecorder implements IConfirmationProvider {
  private readonly descriptions: string[] = [];

  async confirm(description: string): Promise<boolean> {
    this.descriptions.push(description);
    return false;
  }

  get planned(): readonly string[] {
    return this.descriptions;
  }
}
