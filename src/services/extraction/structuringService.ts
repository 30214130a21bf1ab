import { ChatOpenAI } from "@langchain/openai";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import type { Runnable } from "@langchain/core/runnables";
import { hasOpenAI, openAIConfig } from "../../config.js";
import {
  StructuredInvoiceSchema,
  type StructuredInvoice,
} from "../../types/invoice.js";

export interface InvoiceStructurer {
  readonly name: string;
  structure(prompt: string, signal?: AbortSignal): Promise<StructuredInvoice>;
}

export interface StructuringPrompt {
  prompt: string;
  truncated: boolean;
}

const INSTRUCTIONS = `You are extracting line items from a commercial invoice used in a customs audit.
Return the supplier (seller or exporter), the invoice number and the invoice date exactly as printed.
Return one entry per goods line, in document order, with:
- referenceCode: the product identification number
- description: the description of the goods
- quantity: the customs quantity
- unit: the customs unit code
- tariffCode: the tariff classification code
- unitValue: the customs unit value
- lineTotal: the line value in dollars
Numbers must be plain numbers without thousands separators or currency symbols.
Do not invent lines. If there are no goods lines, return an empty list.`;

export const buildPrompt = (text: string, charBudget: number): StructuringPrompt => {
  const truncated = text.length > charBudget;
  const content = truncated ? text.slice(0, charBudget) : text;
  return {
    prompt: `${INSTRUCTIONS}\n\nDocument text:\n${content}`,
    truncated,
  };
};

export interface OpenAIStructurerOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class OpenAIInvoiceStructurer implements InvoiceStructurer {
  readonly name: string;
  private readonly model: Runnable<BaseLanguageModelInput, StructuredInvoice>;

  constructor(options: OpenAIStructurerOptions = {}) {
    const modelName = options.model ?? openAIConfig.model;
    this.name = `openai:${modelName}`;
    this.model = new ChatOpenAI({
      openAIApiKey: options.apiKey ?? openAIConfig.apiKey,
      modelName,
      temperature: options.temperature ?? openAIConfig.temperature,
      // Retries and backoff belong to RetryExecutor
      maxRetries: 0,
      timeout: options.timeoutMs,
    }).withStructuredOutput(StructuredInvoiceSchema, { name: "invoice" });
  }

  async structure(prompt: string, signal?: AbortSignal): Promise<StructuredInvoice> {
    const result = await this.model.invoke(prompt, { signal });
    console.log(
      `✅ [LANGCHAIN_EXTRACT] model=${this.name} supplier=${result.supplier} items=${result.lineItems.length}`
    );
    return result;
  }
}

export const createDefaultStructurer = (
  timeoutMs?: number
): InvoiceStructurer | null => {
  if (!hasOpenAI()) {
    console.log(`🔍 [EXTRACT_MODE] Using pattern extraction only (no OpenAI key)`);
    return null;
  }
  console.log(`🤖 [EXTRACT_MODE] Using OpenAI extraction model=${openAIConfig.model}`);
  return new OpenAIInvoiceStructurer({ timeoutMs });
};
