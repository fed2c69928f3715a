export { type BuildOptions, buildChain, type ChainTable, estimateCapacity } from './builder.ts'
