// Cooperative cancellation shared by every walker in one run.
// Once set it stays set; walkers poll it at the top of each directory.

export class CancellationFlag {
  private stopRequested = false;

  get isSet(): boolean {
    return this.stopRequested;
  }

  set(): void {
    this.stopRequested = true;
  }
}

export const STOPPED_DIAGNOSTIC = 'stopped';
