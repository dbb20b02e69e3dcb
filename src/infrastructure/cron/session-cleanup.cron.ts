import * as cron from "node-cron";
import type { ISessionRepository } from "../../domain/interfaces/isession.repository";

export class SessionCleanupCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private sessionRepository: ISessionRepository,
    private idleTimeoutMinutes: number
  ) {}

  /**
   * Start the cron job to run every 10 minutes
   */
  start(): void {
    if (this.task) {
      console.log("[SessionCleanupCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule("*/10 * * * *", async () => {
      if (this.isRunning) {
        console.log("[SessionCleanupCron] Previous run is still in progress, skipping this execution");
        return;
      }

      this.isRunning = true;
      try {
        await this.runOnce();
      } catch (error) {
        console.error("[SessionCleanupCron] Error in cleanup cycle:", error);
      } finally {
        this.isRunning = false;
      }
    });

    console.log(
      `[SessionCleanupCron] Started cron job to end sessions idle for ${this.idleTimeoutMinutes} minutes (runs every 10 minutes)`
    );
  }

  /**
   * Ends every session idle longer than the timeout. Returns the ended session ids.
   */
  async runOnce(now: Date = new Date()): Promise<string[]> {
    const cutoff = new Date(now.getTime() - this.idleTimeoutMinutes * 60 * 1000);
    const expired = await this.sessionRepository.deleteIdleSince(cutoff);

    if (expired.length === 0) {
      console.log("[SessionCleanupCron] No idle sessions found");
    } else {
      const remaining = await this.sessionRepository.count();
      console.log(`[SessionCleanupCron] Ended ${expired.length} idle session(s), ${remaining} still active`);
    }
    return expired;
  }

  /**
   * Stop the cron job
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[SessionCleanupCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
