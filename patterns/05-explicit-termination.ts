/**
 * Pattern 3.2: Explicit Termination
 *
 * The agent finishes when it says so, not when it happens to stop calling
 * tools. The done tool throws TaskComplete; the loop catches it and returns
 * the carried result.
 */

export class TaskComplete extends Error {
  readonly result: string;

  constructor(result: string) {
    super('Task complete');
    this.name = 'TaskComplete';
    this.result = result;
  }
}
