export class StepTimer {
  private start = 0n;

  constructor(private readonly clock: () => bigint = () => process.hrtime.bigint()) {}

  begin(): void {
    this.start = this.clock();
  }

  elapsed(): number {
    return Number((this.clock() - this.start) / 1_000_000n);
  }
}
