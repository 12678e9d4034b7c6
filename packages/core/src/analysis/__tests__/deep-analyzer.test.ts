import { describe, it, expect } from 'vitest';
import { deepAnalyzerConfig } from '../../config';
import { DeepAnalysisError, DeepAnalysisErrorCode } from '../../errors';
import { emptySignal, type ContentSignal, type Inspector } from '../../inspector/types';
import type { LLMProvider } from '../../llm/types';
import type { FileRef } from '../../taxonomy/contracts';
import { DeepAnalyzer, parseAnalysisResponse, resultPathString, type BatchAnalysisOutcome } from '../deep-analyzer';
import { buildAnalysisPrompt } from '../analysis-prompt';

// ============================================================================
// Helpers
// ============================================================================

class FakeLLM implements LLMProvider {
  readonly id = 'fake';
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string) {}

  async complete(prompt: string): Promise<string> {
    return this.completeJSON(prompt);
  }

  async completeJSON(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

class FakeInspector implements Inspector {
  readonly id = 'fake-inspector';

  constructor(private readonly result: ContentSignal | Error) {}

  async inspect(): Promise<ContentSignal> {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

const FILE: FileRef = { fileId: 'f1', path: '/docs/notes.txt', filename: 'notes.txt' };

async function expectAnalysisError(promise: Promise<unknown>, code: DeepAnalysisErrorCode): Promise<void> {
  try {
    await promise;
    expect.unreachable('expected a DeepAnalysisError');
  } catch (error) {
    expect(error).toBeInstanceOf(DeepAnalysisError);
    expect(error instanceof DeepAnalysisError && error.code).toBe(code);
  }
}

// ============================================================================
// Parsing
// ============================================================================

describe('parseAnalysisResponse', () => {
  it('accepts fenced JSON with a string path and a numeric string confidence', () => {
    const result = parseAnalysisResponse(
      'f1',
      '```json\n{"categoryPath": "Magic / Cards", "confidence": "0.9"}\n```',
      null,
    );

    expect(result.categoryPath).toEqual(['Magic', 'Cards']);
    expect(result.confidence).toBe(0.9);
    expect(result.rationale).toBe('');
    expect(result.suggestedTags).toEqual([]);
    expect(resultPathString(result)).toBe('Magic / Cards');
  });

  it('drops blank path segments', () => {
    const result = parseAnalysisResponse('f1', '{"categoryPath": [" Work ", "", "Reports"], "confidence": 0.8}', null);
    expect(result.categoryPath).toEqual(['Work', 'Reports']);
  });

  it('rejects invalid JSON, empty paths and out-of-range confidence', () => {
    for (const response of [
      'not json at all',
      '{"categoryPath": [], "confidence": 0.5}',
      '{"categoryPath": ["A"], "confidence": 1.5}',
    ]) {
      try {
        parseAnalysisResponse('f1', response, null);
        expect.unreachable(`should reject ${response}`);
      } catch (error) {
        expect(error instanceof DeepAnalysisError && error.code).toBe(DeepAnalysisErrorCode.INVALID_RESPONSE);
      }
    }
  });

  it('rejects malformed text encoding', () => {
    try {
      parseAnalysisResponse('f1', '{"categoryPath": ["A\uFFFD"], "confidence": 0.9}', null);
      expect.unreachable('should reject');
    } catch (error) {
      expect(error instanceof DeepAnalysisError && error.code).toBe(DeepAnalysisErrorCode.INVALID_ENCODING);
    }
  });
});

// ============================================================================
// Prompt
// ============================================================================

describe('buildAnalysisPrompt', () => {
  it('includes only the sections the signal provides', () => {
    const prompt = buildAnalysisPrompt({
      filename: 'clip.mp4',
      signal: { ...emptySignal('video'), sceneTags: ['stage', 'cards'], duration: 125 },
      existingCategories: ['Magic', 'Magic / Videos', 'Cooking'],
      textPreviewChars: 100,
      maxCategoryContext: 2,
    });

    expect(prompt).toContain('FILE: clip.mp4\nTYPE: video');
    expect(prompt).toContain('VISUAL CONTENT TAGS: stage, cards');
    expect(prompt).toContain('DURATION: 2 minutes 5 seconds');
    expect(prompt).toContain('EXISTING CATEGORIES (prefer these if content matches):\nMagic\nMagic / Videos\n\n');
    expect(prompt).not.toContain('EXTRACTED TEXT CONTENT');
    expect(prompt).not.toContain('DETECTED OBJECTS');
  });

  it('truncates the text cue and notes a missing signal', () => {
    const withText = buildAnalysisPrompt({
      filename: 'a.txt',
      signal: { ...emptySignal('text'), textCue: 'abcdefghij' },
      existingCategories: [],
      textPreviewChars: 4,
      maxCategoryContext: 10,
    });
    expect(withText).toContain('EXTRACTED TEXT CONTENT:\nabcd\n\n');

    const withoutSignal = buildAnalysisPrompt({
      filename: 'a.txt',
      signal: null,
      existingCategories: [],
      textPreviewChars: 4,
      maxCategoryContext: 10,
    });
    expect(withoutSignal).toContain('TYPE: unknown');
    expect(withoutSignal).toContain('judge from the filename alone');
  });
});

// ============================================================================
// Analyzer
// ============================================================================

describe('DeepAnalyzer', () => {
  const RESPONSE = '{"categoryPath": ["Finance", "Budgets"], "confidence": 0.92, "suggestedTags": ["budget"]}';

  it('sends the inspector signal and existing categories to the LLM', async () => {
    const llm = new FakeLLM(() => RESPONSE);
    const signal: ContentSignal = { ...emptySignal('text'), textCue: 'Quarterly budget' };
    const analyzer = new DeepAnalyzer(llm, new FakeInspector(signal));

    const result = await analyzer.analyze(FILE, ['Finance']);

    expect(result.fileId).toBe('f1');
    expect(result.categoryPath).toEqual(['Finance', 'Budgets']);
    expect(result.suggestedTags).toEqual(['budget']);
    expect(result.signal).toEqual(signal);
    expect(llm.prompts[0]).toContain('EXTRACTED TEXT CONTENT:\nQuarterly budget');
    expect(llm.prompts[0]).toContain('EXISTING CATEGORIES (prefer these if content matches):\nFinance');
  });

  it('falls back to the filename when inspection fails', async () => {
    const llm = new FakeLLM(() => RESPONSE);
    const analyzer = new DeepAnalyzer(llm, new FakeInspector(new Error('unreadable')));

    const result = await analyzer.analyze(FILE, []);

    expect(result.signal).toBeNull();
    expect(llm.prompts[0]).toContain('judge from the filename alone');
  });

  it('reports LLM failures as unavailable', async () => {
    const llm = new FakeLLM(() => {
      throw new Error('connection refused');
    });
    await expectAnalysisError(new DeepAnalyzer(llm, null).analyze(FILE, []), DeepAnalysisErrorCode.LLM_UNAVAILABLE);
  });

  it('reports unusable responses as invalid', async () => {
    const llm = new FakeLLM(() => 'I think it is finance.');
    await expectAnalysisError(new DeepAnalyzer(llm, null).analyze(FILE, []), DeepAnalysisErrorCode.INVALID_RESPONSE);
  });

  it('refuses to start when already cancelled', async () => {
    const llm = new FakeLLM(() => RESPONSE);
    const controller = new AbortController();
    controller.abort();

    await expectAnalysisError(
      new DeepAnalyzer(llm, null).analyze(FILE, [], controller.signal),
      DeepAnalysisErrorCode.CANCELLED,
    );
    expect(llm.prompts).toEqual([]);
  });

  it('analyzes a batch and keeps going past failures', async () => {
    const llm = new FakeLLM((prompt) => (prompt.includes('FILE: bad.txt') ? 'garbage' : RESPONSE));
    const analyzer = new DeepAnalyzer(llm, null, deepAnalyzerConfig({ maxConcurrent: 1 }));
    const progress: Array<[number, number]> = [];

    const outcomes: BatchAnalysisOutcome[] = await analyzer.analyzeFiles(
      [FILE, { fileId: 'f2', path: '/docs/bad.txt', filename: 'bad.txt' }],
      [],
      (completed, total) => progress.push([completed, total]),
    );

    expect(outcomes.map((outcome) => outcome.success)).toEqual([true, false]);
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('exposes the configured threshold', () => {
    const analyzer = new DeepAnalyzer(new FakeLLM(() => RESPONSE), null, deepAnalyzerConfig({ confidenceThreshold: 0.6 }));
    expect(analyzer.confidenceThreshold).toBe(0.6);
  });
});
