import { describe, it, expect, vi, afterEach } from 'vitest';
import { InquiryParser, buildExtractionPrompt } from './inquiryParser';
import { ExtractionFailure } from './errors';
import { KANDY_GALLE_INQUIRY, extractionDocument, fakeCompletion } from '../test/fixtures';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('InquiryParser', () => {
  it('extracts the Kandy and Galle trip', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { client, completeJson } = fakeCompletion(JSON.stringify(extractionDocument));

    const request = await new InquiryParser(client).extract(KANDY_GALLE_INQUIRY);

    expect(request.destinations).toEqual(['Kandy', 'Galle']);
    expect(request.durationDays).toBe(5);
    expect(request.travelers).toBe(2);
    expect(request.destinationCountry).toBe('Sri Lanka');

    expect(completeJson).toHaveBeenCalledTimes(1);
    const call = completeJson.mock.calls[0][0];
    expect(call.temperature).toBe(0.1);
    expect(call.maxTokens).toBe(500);
    expect(call.user).toBe(buildExtractionPrompt(KANDY_GALLE_INQUIRY));
  });

  it('accepts a fenced response', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { client } = fakeCompletion('```json\n' + JSON.stringify(extractionDocument) + '\n```');

    const request = await new InquiryParser(client).extract(KANDY_GALLE_INQUIRY);
    expect(request.destinations).toEqual(['Kandy', 'Galle']);
  });

  it('fails when the completion call throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { client } = fakeCompletion(new Error('upstream 503'));

    await expect(new InquiryParser(client).extract(KANDY_GALLE_INQUIRY)).rejects.toBeInstanceOf(ExtractionFailure);
  });

  it('fails on a non-JSON response', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { client } = fakeCompletion('Sure! You want to visit Kandy.');

    await expect(new InquiryParser(client).extract(KANDY_GALLE_INQUIRY)).rejects.toThrow(
      'Extraction response was not valid JSON'
    );
  });

  it('fails when no destination can be found', async () => {
    const { client } = fakeCompletion(JSON.stringify({ destination_country: 'Sri Lanka', destinations: [] }));

    const error = await new InquiryParser(client).extract('somewhere warm please, for a week').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionFailure);
    expect(error).toMatchObject({ stage: 'extraction' });
  });
});

describe('buildExtractionPrompt', () => {
  it('embeds the inquiry and the expected keys', () => {
    const prompt = buildExtractionPrompt('Ten days in Ella');
    expect(prompt).toContain('Ten days in Ella');
    expect(prompt).toContain('"destinations": ["string"]');
    expect(prompt).toContain('"duration_days": number');
  });
});
