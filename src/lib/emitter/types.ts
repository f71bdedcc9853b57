/**
 * Emitter module types
 */

import type { Batch, OutputFormat } from "../../types/data-model.js";

export interface Formatter {
  readonly format: OutputFormat;
  readonly mediaType: string;
  render(batch: Batch): string;
}
