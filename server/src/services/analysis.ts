import Anthropic from '@anthropic-ai/sdk';
import type { DateKey } from '@recall-curve/shared';

const SYSTEM_PROMPT = `You are a study coach reviewing a learner's spaced-repetition log.

Each study entry is reviewed 1, 2, 4, 7, 14, 21 and 30 days after it was first studied.
You receive a Markdown report listing every entry, its items, and the status of each review
(Completed, Overdue or Pending).

Write a short analysis in Markdown:
- How consistent the learner has been with reviews, calling out overdue ones by date
- Which items look at risk of being forgotten
- Two or three concrete suggestions for the coming week

Keep it under 300 words. Do not repeat the full report back.`;

export interface Analyzer {
  analyze(report: string, today: DateKey): Promise<string>;
}

export class AnalysisFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalysisFailedError';
  }
}

/**
 * Analyzer that sends the progress report to Anthropic's Messages API.
 */
export function createAnalyzer({ apiKey, model }: { apiKey: string; model: string }): Analyzer {
  const client = new Anthropic({ apiKey });

  return {
    async analyze(report, today) {
      const response = await client.messages
        .create({
          model,
          max_tokens: 1500,
          system: SYSTEM_PROMPT,
          messages: [
            {
              role: 'user',
              content: `Today is ${today}. Here is my study progress:\n\n${report}`,
            },
          ],
        })
        .catch((error: unknown) => {
          console.error('[Analysis] Request failed:', error);
          throw new AnalysisFailedError('Analysis service request failed', { cause: error });
        });

      const textContent = response.content.find((c) => c.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new AnalysisFailedError('No text content in analysis response');
      }

      console.log(`[Analysis] Received ${textContent.text.length} characters from ${model}`);
      return textContent.text;
    },
  };
}
