import { AppError } from "../utils/errors";

class StoreError extends AppError {}

class DimensionError extends StoreError {
  constructor(
    public readonly modelName: string,
    public readonly modelDimension: number,
    public readonly dbDimension: number,
  ) {
    super(
      `Model "${modelName}" produces ${modelDimension}-dimensional vectors, ` +
        `which exceeds the database's fixed dimension of ${dbDimension}. ` +
        `Please use a model with dimension ≤ ${dbDimension}.`,
    );
  }
}

class ConnectionError extends StoreError {}

class DocumentNotFoundError extends StoreError {
  constructor(public readonly reference: string) {
    super(`Document ${reference} not found`);
  }
}

export { StoreError, ConnectionError, DocumentNotFoundError, DimensionError };
