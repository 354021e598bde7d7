/**
 * Tools module - barrel export
 */

export { registerFlowTools, type FlowToolContext } from './flow/index.js';
