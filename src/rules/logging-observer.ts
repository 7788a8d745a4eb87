import type { Logger } from "../util/logger.js";
import type { LoadEvent, LoadObserver } from "./types.js";

/**
 * Report load progress as debug log lines.
 */
export function createLoggingObserver(logger: Logger): LoadObserver {
  return (event) => {
    logger.debug(describeLoadEvent(event));
  };
}

export function describeLoadEvent(event: LoadEvent): string {
  switch (event.type) {
    case "source-resolved":
      return `Resolved ${event.path} as a ${event.kind}`;
    case "directory-scanned":
      return `Found ${event.files} rules files to load within ${event.path}`;
    case "file-parsed":
      return `Loaded ${event.rules} rules from ${event.path}`;
    case "batch-loaded":
      return `Loaded ${event.rules} rules from ${event.sources} ${event.unit}`;
  }
}
