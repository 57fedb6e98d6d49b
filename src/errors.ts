export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

export function createExtractionError(inputPdfPath: string, error: unknown): Error {
  return new Error(`Failed to extract text from PDF ${inputPdfPath}: ${errorMessage(error)}`, {
    cause: error,
  });
}
