/**
 * Table Harvest: Extraction Errors
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

/**
 * Raised when the tokenizer cannot continue. No partial table accompanies it.
 * "No table found" is not an error: it is the empty TableResult.
 */
export class MalformedInputError extends Error {
  override readonly name = "MalformedInputError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
