export { checksum } from "./checksum";
export { isLocalPath, rebaseRelativePath } from "./path";
