/**
 * @sweepmind/board - Environment the agent plays against
 *
 * - Minefield: hidden layout, neighbour counts, flags
 * - Rendering: text grids for the layout and the agent's knowledge
 * - Game driver: plays a SweepAgent against a Minefield
 */

export { Minefield, DEFAULT_FIELD_CONFIG } from './minefield.js';
export { renderMinefield, renderAgentView, type KnowledgeView } from './render.js';
export {
  playGame,
  playSeededGame,
  type GameStatus,
  type MoveRecord,
  type GameReport,
  type GameOptions,
  type SeededGameConfig,
  type SeededGame,
} from './game.js';
