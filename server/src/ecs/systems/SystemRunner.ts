// ============================================
// ECS System Runner
// Manages and executes all arena systems in priority order
// ============================================

import type { ArenaEventSink, World } from '@tank-arena/shared';
import type { System } from './types';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

// Ticks slower than this get a per-system breakdown in the perf log
const SLOW_TICK_MS = 10;

/**
 * SystemRunner - Manages and executes all arena systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Equal priorities keep registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order.
   * A system that throws is logged and skipped; the rest of the tick still runs.
   */
  update(world: World, deltaTime: number, events: ArenaEventSink): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, deltaTime, events);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;
    if (totalMs > SLOW_TICK_MS) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: Number(totalMs.toFixed(1)),
        breakdown: sorted.map((t) => ({ name: t.name, ms: Number(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Registered systems in run order (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map((s) => `${s.system.name} (priority: ${s.priority})`);
  }
}
