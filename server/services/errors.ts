/**
 * Pipeline errors.
 *
 * Only the two completion steps surface errors to callers; every other
 * external lookup degrades silently. The HTTP layer maps any
 * ItineraryPipelineError to one generic "try again" message.
 */

export type PipelineStage = 'extraction' | 'generation';

export class ItineraryPipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ItineraryPipelineError';
    this.stage = stage;
  }
}

/** The inquiry could not be turned into trip parameters */
export class ExtractionFailure extends ItineraryPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction', message, options);
    this.name = 'ExtractionFailure';
  }
}

/** The completion service did not return a usable itinerary document */
export class GenerationFailure extends ItineraryPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generation', message, options);
    this.name = 'GenerationFailure';
  }
}

/** No completion provider key is configured */
export class AINotConfiguredError extends Error {
  constructor() {
    super('No AI API key configured. Set GROQ_API_KEY, OPENAI_API_KEY or DEEPSEEK_API_KEY.');
    this.name = 'AINotConfiguredError';
  }
}
