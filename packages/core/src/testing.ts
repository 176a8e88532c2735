export {
  describeSourceContract,
  type SourceFixture,
  type SourceHarness,
} from "./ports/__tests__/source.contract"
export { countingFetch, type FetchCall } from "./tests/utils/counting-fetch"
export { StepClock } from "./tests/utils/step-clock"
