import * as si from 'systeminformation';
import type {
  ResourceLimits,
  ResourceManager,
  ResourceMonitor,
  ResourceSnapshot,
  ResourceType,
} from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('resources');

const CACHE_TTL_MS = 2000;

/**
 * Host utilization read through systeminformation. Readings are cached for
 * two seconds since a full probe costs hundreds of milliseconds on some hosts.
 */
export class SystemResourceMonitor implements ResourceMonitor {
  private lastSnapshot: ResourceSnapshot | null = null;
  private lastSnapshotAt = 0;

  async snapshot(): Promise<ResourceSnapshot> {
    if (this.lastSnapshot && Date.now() - this.lastSnapshotAt < CACHE_TTL_MS) {
      return this.lastSnapshot;
    }

    const [load, mem, disks] = await Promise.all([si.currentLoad(), si.mem(), si.fsSize()]);

    const diskUse = disks.length > 0
      ? Math.max(...disks.map(d => d.use))
      : 0;

    const snapshot: ResourceSnapshot = {
      cpuUtilization: load.currentLoad,
      memoryUtilization: mem.total > 0 ? (mem.active / mem.total) * 100 : 0,
      diskUtilization: Number.isFinite(diskUse) ? diskUse : 0,
    };

    if (snapshot.cpuUtilization > 90) {
      log.debug(`CPU load high: ${snapshot.cpuUtilization.toFixed(1)}%`);
    }

    this.lastSnapshot = snapshot;
    this.lastSnapshotAt = Date.now();
    return snapshot;
  }
}

/** Limits supplied as plain data at construction time. */
export class StaticResourceManager implements ResourceManager {
  private readonly maxByResourceType: Partial<Record<ResourceType, number>>;

  constructor(maxByResourceType: Partial<Record<ResourceType, number>> = {}) {
    this.maxByResourceType = { ...maxByResourceType };
  }

  async limits(): Promise<ResourceLimits> {
    return { maxByResourceType: { ...this.maxByResourceType } };
  }
}
