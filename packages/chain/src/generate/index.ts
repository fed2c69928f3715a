export {
	DEFAULT_MAX_ATTEMPTS,
	type GenerateOptions,
	generatePoem,
	type Poem,
	type SamplingState,
	sampleFollower,
} from './generator.ts'
export { createSeededRandom, type RandomSource, randomIndex } from './random.ts'
