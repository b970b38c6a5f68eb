import { beforeEach } from "vitest";
import { resetConfig } from "../src/config.js";
import { setLogLevel } from "../src/utils/logger.js";

beforeEach(() => {
  resetConfig();
  setLogLevel("silent");
});
