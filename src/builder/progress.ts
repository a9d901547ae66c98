import { errorMessage } from '../errors';
import type { BuildPhase, BuildProgress, ProgressListener } from '../types';

/** Percentage reported on entering each phase. */
export const PHASE_PERCENTAGE: Readonly<Record<BuildPhase, number>> = {
  initializing: 0,
  backup_creation: 5,
  content_processing: 10,
  template_rendering: 40,
  asset_copying: 75,
  verification: 85,
  cleanup: 95,
  completed: 100,
  rollback: 0,
  failed: 0,
};

/** Upper end of each phase's band; steps inside a phase stay below it. */
const PHASE_CEILING: Readonly<Record<BuildPhase, number>> = {
  initializing: 5,
  backup_creation: 10,
  content_processing: 40,
  template_rendering: 75,
  asset_copying: 85,
  verification: 95,
  cleanup: 100,
  completed: 100,
  rollback: 0,
  failed: 0,
};

/**
 * Append-only audit trail for one build. Listener failures are logged and
 * never reach the build.
 */
export class ProgressReporter {
  private readonly trail: BuildProgress[] = [];
  private floor = 0;

  constructor(private readonly listener?: ProgressListener) {}

  get events(): readonly BuildProgress[] {
    return this.trail;
  }

  get phase(): BuildPhase {
    return this.trail.length > 0 ? this.trail[this.trail.length - 1].phase : 'initializing';
  }

  emit(phase: BuildPhase, message: string, details: Record<string, unknown> = {}): BuildProgress {
    return this.record(phase, PHASE_PERCENTAGE[phase], message, details);
  }

  /**
   * Reports work inside the current phase. `fraction` is the share of the
   * phase already done and maps onto the phase's band.
   */
  step(phase: BuildPhase, fraction: number, message: string, details: Record<string, unknown> = {}): BuildProgress {
    const start = PHASE_PERCENTAGE[phase];
    const done = Math.min(1, Math.max(0, fraction));
    return this.record(phase, Math.round(start + (PHASE_CEILING[phase] - start) * done), message, details);
  }

  private record(
    phase: BuildPhase,
    reported: number,
    message: string,
    details: Record<string, unknown>
  ): BuildProgress {
    let percentage = reported;
    if (phase === 'rollback') {
      this.floor = 0;
    } else {
      percentage = Math.max(this.floor, percentage);
      this.floor = percentage;
    }

    const event: BuildProgress = Object.freeze({
      phase,
      message,
      percentage,
      details: Object.freeze({ ...details }),
      timestamp: new Date(),
    });
    this.trail.push(event);

    const line = `[build] ${phase} (${percentage}%): ${message}`;
    if (phase === 'failed' || phase === 'rollback') {
      console.error(line);
    } else {
      console.log(line);
    }

    this.notify(event);
    return event;
  }

  private notify(event: BuildProgress): void {
    if (!this.listener) return;
    try {
      const returned: unknown = this.listener(event);
      if (returned instanceof Promise) {
        returned.catch((err: unknown) => {
          console.error(`[build] Progress listener rejected: ${errorMessage(err)}`);
        });
      }
    } catch (err) {
      console.error(`[build] Progress listener threw: ${errorMessage(err)}`);
    }
  }
}
