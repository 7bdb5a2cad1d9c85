/**
 * @sweepmind/agent - Deduction agent for the mine-detection puzzle
 *
 * Components:
 * - Sentence: "exactly count of these cells are mines"
 * - KnowledgeBase: proven facts plus fixpoint propagation
 * - Move selection: proven-safe cells first, uniform guess as fallback
 * - SweepAgent: knowledge base and move policy behind one facade
 */

export { Sentence } from './sentence.js';
export { KnowledgeBase, type KnowledgeBaseConfig, type PropagationReport } from './knowledge-base.js';
export { chooseSafeMove, chooseRandomMove, type MoveView } from './move-selector.js';
export { SweepAgent, type AgentConfig } from './agent.js';
