export {
  compareVersions,
  isNumericVersion,
  isPrereleaseTag,
  type Ordering,
  stripVersionPrefix,
} from "./compare.js";
export { selectLatestStableTag } from "./select.js";
