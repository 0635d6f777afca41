/**
 * Vitest Global Setup
 *
 * Forces Unicode status icons so summary assertions do not depend on the terminal.
 */
import { beforeEach } from "vitest";
import { resetIconDetection, setIconSet } from "./packages/shared/src/theme/icons.js";

process.setMaxListeners(0);

beforeEach(() => {
  resetIconDetection();
  setIconSet("unicode");
});
