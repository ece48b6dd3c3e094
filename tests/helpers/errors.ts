import { ConversionError } from "../../src/errors";

/** Runs `fn` and returns the ConversionError it throws or rejects with. */
export const captureError = async (fn: () => unknown): Promise<ConversionError> => {
  try {
    await fn();
  } catch (error) {
    if (error instanceof ConversionError) return error;
    throw error;
  }
  throw new Error("Expected a ConversionError");
};
