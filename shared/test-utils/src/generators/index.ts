/**
 * Test Data Generators Index
 */

export {
  StreamGenerator,
  createStreamGenerator,
  createSeededRandom,
  gaussianRandom,
} from './stream.generator';

export type {
  RandomSource,
  GaussianStreamConfig,
  UniformStreamConfig,
  RandomWalkConfig,
  DuplicateStreamConfig,
} from './stream.generator';
