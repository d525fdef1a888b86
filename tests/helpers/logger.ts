import { vi } from "vitest";
import type { Logger } from "../../src/utils/logger.js";

export function createTestLogger() {
  const logger = {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    debug: vi.fn<Logger["debug"]>(),
    child: vi.fn<Logger["child"]>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
