import { Embeddings } from "@langchain/core/embeddings";
import { DimensionError } from "../errors";

/**
 * Wraps an Embeddings implementation so every vector has exactly the target
 * dimension. Shorter vectors are zero-padded; longer ones are rejected with a
 * DimensionError.
 */
export class FixedDimensionEmbeddings extends Embeddings {
  constructor(
    private readonly embeddings: Embeddings,
    private readonly targetDimension: number,
    private readonly modelSpec: string,
  ) {
    super({});
  }

  private normalizeVector(vector: number[]): number[] {
    const dimension = vector.length;

    if (dimension > this.targetDimension) {
      throw new DimensionError(this.modelSpec, dimension, this.targetDimension);
    }

    if (dimension < this.targetDimension) {
      return [...vector, ...Array.from({ length: this.targetDimension - dimension }, () => 0)];
    }

    return vector;
  }

  async embedQuery(text: string): Promise<number[]> {
    const vector = await this.embeddings.embedQuery(text);
    return this.normalizeVector(vector);
  }

  async embedDocuments(documents: string[]): Promise<number[][]> {
    const vectors = await this.embeddings.embedDocuments(documents);
    return vectors.map((vector) => this.normalizeVector(vector));
  }
}
