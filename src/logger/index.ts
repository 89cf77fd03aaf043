export { debug, info, warn, error, withContext } from "./logger";
