import type { LicenseMailJob, MailQueue } from "../types.js";

/**
 * Collects mail jobs in process. For development and tests.
 */
export class MemoryMailQueue implements MailQueue {
  readonly jobs: LicenseMailJob[] = [];

  async enqueue(job: LicenseMailJob): Promise<void> {
    this.jobs.push(job);
  }
}
