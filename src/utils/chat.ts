import axios from "axios";
import { z } from "zod";
import type { ChatSettings } from "../config";
import { CompletionError, toError } from "./errors";

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string | ChatContentPart[];
}

export interface CompleteOptions {
  /** Optional system prompt sent before the user message */
  system?: string;
  /** Images sent with the prompt, as http(s) or data URLs */
  imageUrls?: string[];
  maxTokens?: number;
}

/**
 * Known chat completion response bodies. Providers return the assistant
 * message either as a plain string or as a list of content parts.
 */
export type ChatCompletionBody =
  | { kind: "text"; text: string }
  | { kind: "parts"; parts: string[] }
  | { kind: "error"; message: string; code?: string | number };

const textBodySchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

const partsBodySchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
        }),
      }),
    )
    .nonempty(),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.union([z.string(), z.number()]).optional(),
  }),
});

/**
 * Decodes a raw response body into one of the known shapes.
 * @throws {CompletionError} If the body matches none of them.
 */
export function decodeChatCompletion(body: unknown): ChatCompletionBody {
  const error = errorBodySchema.safeParse(body);
  if (error.success) {
    return { kind: "error", message: error.data.error.message, code: error.data.error.code };
  }
  const text = textBodySchema.safeParse(body);
  if (text.success) {
    return { kind: "text", text: text.data.choices[0].message.content };
  }
  const parts = partsBodySchema.safeParse(body);
  if (parts.success) {
    return {
      kind: "parts",
      parts: parts.data.choices[0].message.content.flatMap((part) =>
        part.type === "text" && part.text !== undefined ? [part.text] : [],
      ),
    };
  }
  throw new CompletionError("Unrecognized chat completion response");
}

/**
 * Sends a single-turn prompt to an OpenAI-compatible chat completions endpoint
 * and returns the assistant text.
 */
export async function complete(
  prompt: string,
  settings: ChatSettings,
  options: CompleteOptions = {},
): Promise<string> {
  if (!settings.apiKey) {
    throw new CompletionError("OPENAI_API_KEY is required for chat completions");
  }

  const messages: ChatMessage[] = [];
  if (options.system) {
    messages.push({ role: "system", content: options.system });
  }
  const imageUrls = options.imageUrls ?? [];
  messages.push({
    role: "user",
    content:
      imageUrls.length === 0
        ? prompt
        : [
            { type: "text", text: prompt },
            ...imageUrls.map(
              (url): ChatContentPart => ({ type: "image_url", image_url: { url } }),
            ),
          ],
  });

  let data: unknown;
  try {
    const response = await axios.post(
      `${settings.baseURL}/chat/completions`,
      {
        model: settings.model,
        messages,
        ...(options.maxTokens ? { max_tokens: options.maxTokens } : {}),
      },
      {
        headers: {
          Authorization: `Bearer ${settings.apiKey}`,
          "Content-Type": "application/json",
        },
      },
    );
    data = response.data;
  } catch (error) {
    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    throw new CompletionError(
      `Chat completion request failed${status ? ` with status ${status}` : ""}`,
      status,
      toError(error),
    );
  }

  const body = decodeChatCompletion(data);
  switch (body.kind) {
    case "text":
      return body.text;
    case "parts":
      return body.parts.join("");
    case "error":
      throw new CompletionError(`Chat completion failed: ${body.message}`);
  }
}
