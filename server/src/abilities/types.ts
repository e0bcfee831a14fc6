import type { ArenaEventSink, World } from '@tank-arena/shared';

/**
 * Context required by abilities.
 * Passed in by the calling system so abilities never reach for globals.
 */
export interface AbilityContext {
  world: World;
  events: ArenaEventSink;
}
