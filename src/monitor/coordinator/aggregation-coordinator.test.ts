/**
 * AggregationCoordinator Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AggregationCoordinator, createHostMonitor } from './aggregation-coordinator.js';
import { MonitorInitializationError } from '../errors.js';
import { FakeMetricSource, makeMemoryCounters } from '../test-setup.js';

describe('AggregationCoordinator', () => {
  let source: FakeMetricSource;
  let coordinator: AggregationCoordinator;

  beforeEach(() => {
    vi.useFakeTimers();
    source = new FakeMetricSource();
    source.setCpuTicks([1000, 800], [[500, 400], [500, 400]]);
    coordinator = new AggregationCoordinator(source, { updateIntervalMs: 1000 });
  });

  afterEach(async () => {
    await coordinator.stop();
    vi.useRealTimers();
  });

  describe('Initialization', () => {
    it('should build the monitors once', async () => {
      const initialized = vi.fn();
      coordinator.on('initialized', initialized);

      expect(coordinator.getCpuMonitor()).toBeNull();
      expect(coordinator.getCurrentCpuSnapshot()).toBeNull();

      await expect(coordinator.initialize()).resolves.toBe(true);
      await expect(coordinator.initialize()).resolves.toBe(true);

      expect(initialized).toHaveBeenCalledTimes(1);
      expect(coordinator.isInitialized()).toBe(true);
      expect(coordinator.getCpuMonitor()?.getModel()).toBe('Test CPU');
      expect(coordinator.getCurrentCpuSnapshot()?.coreCount).toBe(2);
      expect(coordinator.getCurrentMemorySnapshot()?.status).toBe('unknown');
    });

    it('should report a failure once and refuse to start', async () => {
      source.coreCount = 0;
      const failed = vi.fn();
      coordinator.on('initializationFailed', failed);

      await expect(coordinator.initialize()).resolves.toBe(false);
      await expect(coordinator.initialize()).resolves.toBe(false);
      await expect(coordinator.start()).resolves.toBe(false);

      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0]?.[0]).toBeInstanceOf(MonitorInitializationError);
      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.isInitialized()).toBe(false);
    });

    it('should wrap a failed source read with its cause', async () => {
      const cause = new Error('cpuinfo unreadable');
      source.coreCountError = cause;
      const failed = vi.fn();
      coordinator.on('initializationFailed', failed);

      await coordinator.initialize();

      const error: unknown = failed.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(MonitorInitializationError);
      expect(error instanceof Error ? error.cause : undefined).toBe(cause);
    });

    it('should share one initialization between concurrent callers', async () => {
      const readCoreCount = vi.spyOn(source, 'readCoreCount');

      const [first, second] = await Promise.all([coordinator.initialize(), coordinator.initialize()]);

      expect(first).toBe(true);
      expect(second).toBe(true);
      expect(readCoreCount).toHaveBeenCalledTimes(1);
    });
  });

  describe('Lifecycle', () => {
    it('should start the monitors and publish the overview', async () => {
      const stateChanged = vi.fn();
      const overviewUpdated = vi.fn();
      coordinator.on('monitoringStateChanged', stateChanged);
      coordinator.on('overviewUpdated', overviewUpdated);

      await expect(coordinator.start()).resolves.toBe(true);
      expect(stateChanged).toHaveBeenCalledWith(true);
      expect(coordinator.isRunning()).toBe(true);
      expect(coordinator.alerts.isCleanupRunning()).toBe(true);

      await vi.advanceTimersByTimeAsync(2000);

      expect(overviewUpdated).toHaveBeenCalled();
      const overview = coordinator.getCurrentOverview();
      expect(overview.cpu?.status).toBe('normal');
      expect(overview.memory?.status).toBe('normal');
      expect(overview.timestamp).toBeInstanceOf(Date);
    });

    it('should not publish the overview until both snapshots are valid', async () => {
      source.memory = null;
      const overviewUpdated = vi.fn();
      coordinator.on('overviewUpdated', overviewUpdated);

      await coordinator.start();
      await vi.advanceTimersByTimeAsync(3000);

      expect(overviewUpdated).not.toHaveBeenCalled();
      expect(coordinator.getCurrentOverview().cpu?.status).toBe('normal');
      expect(coordinator.getCurrentOverview().timestamp).toBeNull();
    });

    it('should pause and resume every monitor', async () => {
      const stateChanged = vi.fn();
      coordinator.on('monitoringStateChanged', stateChanged);
      await coordinator.start();

      coordinator.pause();
      expect(coordinator.isPaused()).toBe(true);
      expect(coordinator.getCpuMonitor()?.isPaused()).toBe(true);
      expect(coordinator.getMemoryMonitor()?.isPaused()).toBe(true);

      await vi.advanceTimersByTimeAsync(3000);
      expect(source.cpuReads).toBe(0);
      expect(source.memoryReads).toBe(0);

      coordinator.resume();
      await vi.advanceTimersByTimeAsync(1000);
      expect(source.cpuReads).toBe(1);

      expect(stateChanged.mock.calls).toEqual([[true], [false], [true]]);
    });

    it('should stop ticking once stopped', async () => {
      const stateChanged = vi.fn();
      coordinator.on('monitoringStateChanged', stateChanged);
      await coordinator.start();
      await vi.advanceTimersByTimeAsync(1000);

      await coordinator.stop();
      await coordinator.stop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(source.cpuReads).toBe(1);
      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.alerts.isCleanupRunning()).toBe(false);
      expect(stateChanged.mock.calls).toEqual([[true], [false]]);
    });

    it('should not start when stopped during initialization', async () => {
      const stateChanged = vi.fn();
      coordinator.on('monitoringStateChanged', stateChanged);

      const starting = coordinator.start();
      await coordinator.stop();

      await expect(starting).resolves.toBe(false);
      await vi.advanceTimersByTimeAsync(3000);

      expect(coordinator.isInitialized()).toBe(true);
      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.alerts.isCleanupRunning()).toBe(false);
      expect(source.cpuReads).toBe(0);
      expect(stateChanged).not.toHaveBeenCalled();
    });

    it('should propagate a clamped update interval', async () => {
      await coordinator.initialize();

      expect(coordinator.setUpdateInterval(50)).toBe(100);
      expect(coordinator.getCpuMonitor()?.getUpdateInterval()).toBe(100);
      expect(coordinator.getMemoryMonitor()?.getUpdateInterval()).toBe(100);
    });

    it('should apply an interval and history size chosen before initialization', async () => {
      coordinator.setUpdateInterval(500);
      expect(coordinator.setHistorySize(5)).toBe(10);

      await coordinator.initialize();

      expect(coordinator.getCpuMonitor()?.getUpdateInterval()).toBe(500);
      expect(coordinator.getMemoryMonitor()?.getHistorySize()).toBe(10);
    });
  });

  describe('Alerts', () => {
    it('should feed snapshots to the alert engine', async () => {
      source.temperature = 82;
      source.memory = makeMemoryCounters({ total: 1e9, available: 4e7 });
      await coordinator.start();

      await vi.advanceTimersByTimeAsync(1000);

      const titles = coordinator.getActiveAlerts().map((alert) => alert.title);
      expect(titles).toEqual(['Temperature Critical', 'Memory Critical']);
    });

    it('should delegate acknowledgement', async () => {
      source.temperature = 82;
      await coordinator.start();
      await vi.advanceTimersByTimeAsync(1000);

      const [alert] = coordinator.getActiveAlerts();
      expect(alert).toBeDefined();
      expect(coordinator.acknowledge(alert?.id ?? -1)).toBe(true);
      expect(coordinator.getActiveAlerts()).toEqual([]);
      expect(coordinator.getAllAlerts()).toHaveLength(1);
    });

    it('should keep alert cooldowns across pause and resume', async () => {
      source.temperature = 82;
      await coordinator.start();
      await vi.advanceTimersByTimeAsync(1000);

      const before = coordinator.alerts.getAlertState('temperature', 'critical');
      expect(before.isActive).toBe(true);

      coordinator.pause();
      await vi.advanceTimersByTimeAsync(10_000);
      coordinator.resume();
      await vi.advanceTimersByTimeAsync(1000);

      expect(source.cpuReads).toBe(2);
      expect(coordinator.getAllAlerts()).toHaveLength(1);
      expect(coordinator.alerts.getAlertState('temperature', 'critical')).toEqual(before);
    });

    it('should update the overview and alerts when a threshold listener throws', async () => {
      source.memory = makeMemoryCounters({ total: 1e9, available: 1e7 });
      await coordinator.initialize();
      const errors = vi.fn();
      coordinator.on('monitoringError', errors);
      coordinator.getMemoryMonitor()?.on('memoryCritical', () => {
        throw new Error('consumer failed');
      });

      await coordinator.getMemoryMonitor()?.sampleNow();

      expect(coordinator.getCurrentOverview().memory?.usagePercentage).toBe(99);
      expect(coordinator.getAllAlerts().map((alert) => alert.message)).toEqual(['Memory usage critical: 99.0%']);
      expect(errors).toHaveBeenCalledTimes(1);
      expect(errors.mock.calls[0]?.[1]).toBe('memory');
    });
  });

  it('should re-emit monitor errors with their source', async () => {
    await coordinator.initialize();
    const errors = vi.fn();
    coordinator.on('monitoringError', errors);
    coordinator.getMemoryMonitor()?.on('snapshot', () => {
      throw new Error('consumer failed');
    });

    await coordinator.getMemoryMonitor()?.sampleNow();

    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0]?.[1]).toBe('memory');
  });

  it('should return overview copies', async () => {
    await coordinator.start();
    await vi.advanceTimersByTimeAsync(2000);

    const first = coordinator.getCurrentOverview();
    const second = coordinator.getCurrentOverview();

    expect(first).toEqual(second);
    expect(first.timestamp).not.toBe(second.timestamp);

    const capturedAt = second.cpu?.timestamp?.getTime();
    first.cpu?.timestamp?.setTime(0);
    expect(capturedAt).toBeGreaterThan(0);
    expect(coordinator.getCurrentOverview().cpu?.timestamp?.getTime()).toBe(capturedAt);
  });
});

describe('createHostMonitor', () => {
  it('should return an uninitialized coordinator', () => {
    const monitor = createHostMonitor({ config: { updateIntervalMs: 2000 } });

    expect(monitor.isInitialized()).toBe(false);
    expect(monitor.isRunning()).toBe(false);
    expect(monitor.getUpdateInterval()).toBe(2000);
  });
});
