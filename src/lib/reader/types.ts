/**
 * Record reader types
 */

import type { Readable } from "stream";
import type { InputFormat } from "../../types/config.js";

export interface ReaderOptions {
  format?: InputFormat;
  /** Stream used when the input path is "-" or "stdin" */
  stdin?: Readable;
}
