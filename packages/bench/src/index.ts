export {
  benchTokenize,
  benchEncode,
  benchTrain,
  runAllBenches,
  formatResults,
  loadBenchVocab,
  type BenchResult,
} from "./tokenize.js";
export { syntheticText } from "./text.js";
