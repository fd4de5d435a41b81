import fs from "node:fs/promises";
import axios from "axios";
import { z } from "zod";
import type { ContentUnderstandingSettings } from "../config";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ConversionError } from "./errors";
import type { AnalyzeOperation } from "./types";

const operationSchema = z.object({
  status: z.string(),
  result: z
    .object({
      contents: z.array(z.object({ markdown: z.string().optional() })).default([]),
    })
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

/**
 * Decodes an analyze poll response. Statuses are matched case-insensitively.
 * @throws {ConversionError} If the body is not a recognizable operation.
 */
export function decodeAnalyzeOperation(body: unknown): AnalyzeOperation {
  const parsed = operationSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConversionError("Unrecognized analyze operation response");
  }
  const { status, result, error } = parsed.data;

  switch (status.toLowerCase()) {
    case "notstarted":
    case "running":
      return { status: "running" };
    case "succeeded":
      return { status: "succeeded", markdown: result?.contents[0]?.markdown ?? "" };
    case "failed":
      return { status: "failed", message: error?.message ?? "unknown error" };
    default:
      throw new ConversionError(`Unexpected analyze operation status: ${status}`);
  }
}

/**
 * Client for a remote document analysis service that returns markdown for
 * PDF, Office and other binary documents.
 */
export class ContentUnderstandingClient {
  constructor(private readonly settings: ContentUnderstandingSettings) {}

  /**
   * Submits the file for analysis and polls until the operation finishes.
   * @returns Markdown of the first content item, or "" when there is none.
   */
  async analyze(filePath: string): Promise<string> {
    const { endpoint, apiKey, apiVersion, analyzerId } = this.settings;
    if (!endpoint) {
      throw new ConversionError(
        "CONTENT_UNDERSTANDING_ENDPOINT is required to convert this file type",
        filePath,
      );
    }
    if (!apiKey) {
      throw new ConversionError(
        "CONTENT_UNDERSTANDING_KEY is required to convert this file type",
        filePath,
      );
    }

    const headers = { "Ocp-Apim-Subscription-Key": apiKey };
    const analyzeUrl = `${endpoint.replace(/\/+$/, "")}/contentunderstanding/analyzers/${analyzerId}:analyze?api-version=${apiVersion}`;

    let operationUrl: unknown;
    try {
      const data = await fs.readFile(filePath);
      logger.info(`📤 Submitting ${filePath} to analyzer ${analyzerId}`);
      const response = await axios.post(analyzeUrl, data, {
        headers: { ...headers, "Content-Type": "application/octet-stream" },
      });
      operationUrl = response.headers["operation-location"];
    } catch (error) {
      throw new ConversionError(
        `Failed to submit ${filePath} for analysis`,
        filePath,
        toError(error),
      );
    }

    if (typeof operationUrl !== "string" || !operationUrl) {
      throw new ConversionError(
        "Analyze response did not include an Operation-Location header",
        filePath,
      );
    }

    return this.pollResult(operationUrl, headers, filePath);
  }

  private async pollResult(
    operationUrl: string,
    headers: Record<string, string>,
    filePath: string,
  ): Promise<string> {
    const deadline = Date.now() + this.settings.timeoutMs;

    while (true) {
      let body: unknown;
      try {
        const response = await axios.get(operationUrl, { headers });
        body = response.data;
      } catch (error) {
        throw new ConversionError(
          `Failed to poll analyze operation for ${filePath}`,
          filePath,
          toError(error),
        );
      }

      const operation = decodeAnalyzeOperation(body);
      if (operation.status === "succeeded") {
        logger.info(`✅ Analysis of ${filePath} succeeded`);
        return operation.markdown;
      }
      if (operation.status === "failed") {
        throw new ConversionError(
          `Analyze operation failed for ${filePath}: ${operation.message}`,
          filePath,
        );
      }
      if (Date.now() >= deadline) {
        throw new ConversionError(
          `Analyze operation for ${filePath} did not finish within ${this.settings.timeoutMs}ms`,
          filePath,
        );
      }

      logger.debug(`⏳ Waiting for analysis of ${filePath}`);
      await new Promise((resolve) => setTimeout(resolve, this.settings.pollIntervalMs));
    }
  }
}
