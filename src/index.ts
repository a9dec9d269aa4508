export * from './engine/types';
export * from './engine/constants';
export { rotateFromAnchor, tokenizeLine, layoutBricks, maxVisibleRows, gutterLabel } from './engine/layout';
export { createMonospaceMetrics } from './engine/metrics';
export { createWorld, stepWorld, NO_INPUT } from './engine/world';
export { BreakoutSimulation, type SimulationOptions } from './engine/BreakoutSimulation';
export {
  cleanSourceLine,
  collectDisplayLines,
  anchorForAddress,
  StaticLineSource,
  type LineSource,
  type SourceLines,
} from './source/lines';
export { PLACEHOLDER_LINES } from './source/placeholder';
export { InputState, type GameCommand } from './runtime/InputHandler';
export { GameLoop, type RenderCallback } from './runtime/GameLoop';
export { HoverTracker, type TooltipChange } from './runtime/HoverTracker';
export { BridgeSession } from './bridge/session';
export { startBridgeServer, type BridgeServer } from './bridge/bridge-server';
