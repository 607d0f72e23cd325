export {
  lastN,
  sortedCopy,
  naiveSum,
  naiveMean,
  naiveVariance,
  naiveQuantile,
} from './brute-force';
