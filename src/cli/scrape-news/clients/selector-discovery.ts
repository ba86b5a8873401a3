import { Agent, run } from "@openai/agents";
import type { Logger } from "~clients/logger";

import { SelectorCandidateSchema } from "../types/schemas";

type SelectorAgent = Agent<unknown, typeof SelectorCandidateSchema>;

export type IdentifySelectorsRequest = {
  markupSample: string;
  modelId: string;
  signal?: AbortSignal;
};

/**
 * External selector-discovery collaborator. The payload it resolves with is
 * untrusted and must be validated by the caller.
 */
export type SelectorDiscovery = {
  identifySelectors(request: IdentifySelectorsRequest): Promise<unknown>;
};

export type OpenAiSelectorDiscoveryConfig = {
  logger: Logger;
  createAgent?: (modelId: string) => SelectorAgent;
};

const SELECTOR_INSTRUCTIONS = `You are an expert at analyzing HTML structure and identifying CSS selectors.

You will receive an excerpt of a news index page. Identify CSS selectors for:
1. articleContainer: the element wrapping ONE article entry (it must match every entry in the listing)
2. title: the headline, relative to the container
3. kicker: the short line above the headline (category, overline or teaser), relative to the container
4. image: the article's <img>, relative to the container
5. link: the element whose href points to the full article, relative to the container

Guidelines:
- Prefer class-based selectors (e.g., ".headline") over tag-only selectors
- Sub-selectors are evaluated inside a single container, so do not repeat the container selector in them
- Use plain CSS only: no :contains(), no XPath, no jQuery extensions
- If the listing has no visible kicker, return the most plausible short text element anyway

IMPORTANT: respond with ONLY a JSON object in this exact format:
{
  "articleContainer": "...",
  "title": "...",
  "kicker": "...",
  "image": "...",
  "link": "...",
  "confidence": 0.0
}

confidence is your estimate between 0 and 1 that the selectors match every article entry, or null if you cannot tell.`;

/**
 * Asks an OpenAI agent for listing selectors. One agent is created per model
 * and reused.
 */
export class OpenAiSelectorDiscovery implements SelectorDiscovery {
  private logger: Logger;
  private createAgent: (modelId: string) => SelectorAgent;
  private agents = new Map<string, SelectorAgent>();

  constructor(config: OpenAiSelectorDiscoveryConfig) {
    this.logger = config.logger;
    this.createAgent = config.createAgent ?? this.createSelectorAgent;
  }

  private createSelectorAgent = (modelId: string): SelectorAgent =>
    new Agent({
      name: "ListingSelectorAnalyzer",
      model: modelId,
      tools: [],
      outputType: SelectorCandidateSchema,
      instructions: SELECTOR_INSTRUCTIONS,
    });

  private getAgent(modelId: string): SelectorAgent {
    let agent = this.agents.get(modelId);
    if (!agent) {
      agent = this.createAgent(modelId);
      this.agents.set(modelId, agent);
    }
    return agent;
  }

  async identifySelectors({
    markupSample,
    modelId,
    signal,
  }: IdentifySelectorsRequest): Promise<unknown> {
    const prompt = `Analyze the following excerpt of a news index page and identify the selectors for its article listing.

--- HTML excerpt (${markupSample.length} characters) ---
${markupSample}
--- end of excerpt ---

Respond with only the JSON object.`;

    this.logger.debug("Requesting selectors", {
      modelId,
      sampleLength: markupSample.length,
    });

    const response = await run(this.getAgent(modelId), prompt, { signal });
    return response.finalOutput;
  }
}
