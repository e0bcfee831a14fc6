// ============================================
// Abilities - actions a tank can take besides moving
// ============================================

export type { AbilityContext } from './types';

export { canFire, shoot, projectileSpawnPoint } from './cannon';
