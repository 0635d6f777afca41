export { computeChecksum, sha256OfStream } from "./checksum.js";
