export { SharedFlags, LlmFlags } from './flags.js';
export { outputJsonOrPlain, sectionHeader, formatLineRanges, colorPercentage } from './output.js';
export { resolveSourceRoot, loadSymbolIndex, loadCoverage, type LoadIndexOptions } from './source-root.js';
