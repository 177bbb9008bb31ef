import { setLogLevel } from "../src/utils/logger.js";

setLogLevel("silent");
