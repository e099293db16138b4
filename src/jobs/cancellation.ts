import { CancellationSignal } from "../utils/errors";

/**
 * Read side of a job's cancellation flag. Passed from submission down to
 * every stage and into the progress loop; checking it is cheap and never blocks.
 */
export class CancellationToken {
  constructor(private readonly isRequested: () => boolean) {}

  static none(): CancellationToken {
    return new CancellationToken(() => false);
  }

  throwIfCancellationRequested(stage: string): void {
    if (this.isRequested()) {
      throw new CancellationSignal(stage);
    }
  }
}
