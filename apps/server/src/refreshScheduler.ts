import type { RefreshCoordinator } from "./refreshCoordinator";

export class RefreshScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly coordinator: Pick<RefreshCoordinator, "refresh">,
    private readonly intervalSeconds: number
  ) {}

  start() {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick("timer");
    }, this.intervalSeconds * 1000);
    this.timer.unref();
    console.info(`Background refresh every ${this.intervalSeconds}s started`);
    void this.tick("startup");
  }

  stop() {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    console.info("Background refresh stopped");
  }

  isRunning() {
    return this.timer !== null;
  }

  private async tick(trigger: "startup" | "timer") {
    const result = await this.coordinator.refresh(trigger);
    if (result.success) {
      console.info(`Background refresh completed (${trigger})`);
    } else {
      console.warn(`Background refresh failed (${trigger}): ${result.error.message}`);
    }
  }
}
