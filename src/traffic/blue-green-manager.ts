import type { IncomingHttpHeaders } from 'http';
import { BackendPool } from '../backend/pool';
import { logger } from '../utils/logger';
import { routingBucket, routingIdentifier } from './routing-hash';

export type DeploymentVersion = 'blue' | 'green';

export interface BlueGreenStatus {
  activeVersion: DeploymentVersion;
  shiftTarget: DeploymentVersion | null;
  trafficShift: number;
  shifting: boolean;
  shiftDurationMs: number;
  elapsedMs: number;
}

/**
 * Two deployments of one backend with a traffic dial between them.
 * Requests whose routing bucket falls under the current shift percentage
 * go to the shift target; everything else stays on the active version.
 * The dial is advanced by its own timer, independent of request arrival.
 */
export class BlueGreenManager {
  private activeVersion: DeploymentVersion = 'blue';
  private shiftTarget: DeploymentVersion | null = null;
  private trafficShift = 0;
  private startTime = 0;
  private shiftDuration = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly blue: BackendPool,
    private readonly green: BackendPool,
    private readonly tickMs: number = 100
  ) {}

  selectBackend(req: { headers: IncomingHttpHeaders }): BackendPool {
    if (this.shiftTarget && routingBucket(routingIdentifier(req)) < Math.floor(this.trafficShift)) {
      return this.poolFor(this.shiftTarget);
    }
    return this.poolFor(this.activeVersion);
  }

  startGradualShift(target: DeploymentVersion, durationMs: number): void {
    this.clearTimer();
    this.shiftTarget = target;
    this.trafficShift = 0;
    this.startTime = Date.now();
    this.shiftDuration = durationMs;

    logger.info('Blue-green traffic shift started', {
      from: this.activeVersion,
      to: target,
      durationMs
    });

    if (durationMs <= 0) {
      this.completeShift(target);
      return;
    }

    this.timer = setInterval(() => this.progress(target), this.tickMs);
  }

  /** Freezes the dial where it is; the active version does not change. */
  stop(): void {
    this.clearTimer();
  }

  getActiveVersion(): DeploymentVersion {
    return this.activeVersion;
  }

  getTrafficShift(): number {
    return this.trafficShift;
  }

  getStatus(): BlueGreenStatus {
    return {
      activeVersion: this.activeVersion,
      shiftTarget: this.shiftTarget,
      trafficShift: this.trafficShift,
      shifting: this.timer !== null,
      shiftDurationMs: this.shiftDuration,
      elapsedMs: this.startTime > 0 ? Date.now() - this.startTime : 0
    };
  }

  private progress(target: DeploymentVersion): void {
    const elapsed = Date.now() - this.startTime;
    if (elapsed >= this.shiftDuration) {
      this.completeShift(target);
      return;
    }
    this.trafficShift = (elapsed / this.shiftDuration) * 100;
  }

  private completeShift(target: DeploymentVersion): void {
    this.clearTimer();
    this.trafficShift = 100;
    this.activeVersion = target;
    logger.info('Blue-green traffic shift completed', { activeVersion: target });
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private poolFor(version: DeploymentVersion): BackendPool {
    return version === 'blue' ? this.blue : this.green;
  }
}
