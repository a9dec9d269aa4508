/**
 * HUD text formatting.
 */

/** Status line shown above the code area, e.g. "Score: 30   Lives: 2". */
export function formatStatus(score: number, lives: number): string {
  return `Score: ${score}   Lives: ${lives}`;
}

/** Banner drawn over the field once the last life is gone. */
export const GAME_OVER_TEXT = 'GAME OVER\nPress R to restart';
