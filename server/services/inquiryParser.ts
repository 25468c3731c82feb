/**
 * Inquiry Parser
 *
 * Free-text inquiry -> trip parameters, via one completion call. There is
 * no local fallback heuristic: any failure is an ExtractionFailure.
 */

import type { TripRequest } from '@shared/schema';
import type { CompletionClient } from './aiClientFactory';
import { ExtractionFailure } from './errors';
import { parseExtraction } from './modelDocument';
import { parseCompletionJson } from './completionJson';

const EXTRACTION_SYSTEM_PROMPT =
  'Extract travel information from the inquiry. Parse destinations as a list if multiple cities are mentioned, in the order the traveler will visit them.';

export function buildExtractionPrompt(inquiry: string): string {
  return `Extract the following information from this travel inquiry:
${inquiry}

Return as JSON:
{
  "destination_country": "string",
  "destinations": ["string"],
  "duration_days": number,
  "travelers": number,
  "budget": "string",
  "interests": ["string"],
  "travel_dates": "string"
}`;
}

export class InquiryParser {
  constructor(private readonly completion: CompletionClient) {}

  async extract(inquiry: string): Promise<TripRequest> {
    let content: string;
    try {
      content = await this.completion.completeJson({
        system: EXTRACTION_SYSTEM_PROMPT,
        user: buildExtractionPrompt(inquiry),
        temperature: 0.1,
        maxTokens: 500,
      });
    } catch (error) {
      console.error('[InquiryParser] Completion call failed:', error);
      throw new ExtractionFailure('Completion call failed during extraction', { cause: error });
    }

    let raw: unknown;
    try {
      raw = parseCompletionJson(content);
    } catch (error) {
      console.error('[InquiryParser] Response was not valid JSON');
      throw new ExtractionFailure('Extraction response was not valid JSON', { cause: error });
    }

    const request = parseExtraction(raw);
    if (request.destinations.length === 0) {
      throw new ExtractionFailure('No destination could be extracted from the inquiry');
    }

    console.log(
      `[InquiryParser] ${request.destinations.join(' → ')} (${request.destinationCountry || 'country unknown'}), ` +
        `${request.durationDays} days, ${request.travelers} travelers`
    );
    return request;
  }
}
