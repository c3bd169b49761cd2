export { sha256Hex, digestsEqual } from "./checksum";
