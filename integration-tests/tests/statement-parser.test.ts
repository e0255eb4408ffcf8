/**
 * Statement Parser Pipeline Tests
 *
 * End-to-end runs of the parser with fake PDF, OCR and model collaborators.
 */

import {
  StatementParser,
  validateParseResult,
  ConfigurationError,
  DocumentReadError,
  UpstreamServiceError,
  toErrorEnvelope,
  NOT_FOUND,
  type OcrEngine,
  type ParseResult,
  type StatementParserOptions,
} from '@statement-insight/shared';
import {
  FakeCompletionClient,
  FakeDocument,
  FakeLoader,
  FakeOcr,
  TEST_API_KEY,
  modelJson,
  type FakePage,
} from './helpers';

const DIGITAL_PAGES: FakePage[] = [
  { embedded: 'Platinum Rewards Card Statement\nAccount ending 1234\nStatement Date 2024-01-01' },
  { embedded: 'New Balance $1,234.56\nMinimum Payment Due $50.00\nPayment Due Date 2024-01-25' },
];

interface Harness {
  parser: StatementParser;
  document: FakeDocument;
  client: FakeCompletionClient;
  ocrEngines: FakeOcr[];
}

function createHarness(
  pages: FakePage[],
  reply: string | null | Error,
  overrides: Partial<StatementParserOptions> = {}
): Harness {
  const document = new FakeDocument(pages);
  const client = new FakeCompletionClient(reply);
  const ocrEngines: FakeOcr[] = [];

  const parser = new StatementParser({
    loader: new FakeLoader(document),
    createOcrEngine: async () => {
      const engine = new FakeOcr(document);
      ocrEngines.push(engine);
      return engine;
    },
    apiKey: TEST_API_KEY,
    client,
    model: 'llama-3.1-8b-instant',
    maxPromptChars: 7000,
    legibilityThreshold: 40,
    ocrDpi: 300,
    currencySymbol: '$',
    ...overrides,
  });

  return { parser, document, client, ocrEngines };
}

function expectSuccess(result: ParseResult) {
  if (!result.success) {
    throw new Error(`expected success, got ${result.error_code}: ${result.error}`);
  }
  return result;
}

describe('StatementParser', () => {
  it('should normalize amounts and derive insights for a digital statement', async () => {
    const reply = modelJson({
      issuer: 'Platinum Bank',
      card_last4: '1234',
      statement_date: '2024-01-01',
      due_date: '2024-01-25',
      total_balance: '$1,234.56',
      minimum_payment: '$50.00',
    });
    const { parser, document, ocrEngines } = createHarness(DIGITAL_PAGES, reply);

    const result = expectSuccess(await parser.parse('/uploads/statement.pdf'));

    expect(result.data).toEqual({
      issuer: 'Platinum Bank',
      card_last4: '1234',
      statement_date: '2024-01-01',
      due_date: '2024-01-25',
      total_balance: '1234.56',
      minimum_payment: '50.00',
    });
    expect(result.success_rate).toBe(100);
    expect(result.method).toBe('AI-Powered (llama-3.1-8b-instant)');
    expect(result.page_count).toBe(2);
    expect(result.ocr_pages).toEqual([]);
    expect(result.insights.map((i) => i.title)).toEqual(['Long Payoff Period', 'Smart Payment Tip']);
    expect(result.insights[0].message).toBe(
      'Paying minimum only will take 24 months. Estimated interest: $457.24'
    );
    expect(ocrEngines).toHaveLength(0);
    expect(document.closed).toBe(true);
  });

  it('should repair prose-wrapped JSON and infer the issuer from the text', async () => {
    const reply =
      'Sure, here is the JSON:\n' +
      '{"issuer":"Not found","card_last4":"1234","statement_date":"2024-01-01",' +
      '"due_date":"2024-01-25","total_balance":"$500","minimum_payment":"$25"}\n' +
      'Let me know if you need more.';
    const pages: FakePage[] = [
      { embedded: 'Your hsbc credit card statement for January 2024\nAccount ending 1234' },
    ];
    const { parser } = createHarness(pages, reply);

    const result = expectSuccess(await parser.parse('/uploads/hsbc.pdf'));

    expect(result.data.issuer).toBe('HSBC');
    expect(result.data.total_balance).toBe('500');
    expect(result.data.minimum_payment).toBe('25');
    expect(result.extracted_count).toBe(5);
    expect(result.success_rate).toBe(100);
    // 500 / 25 = 20 months, 500 / 12 = 41.67 > 25
    expect(result.insights).toEqual([
      {
        type: 'info',
        title: 'Smart Payment Tip',
        message: 'Pay $41.67/month to save ~$60.00 in interest',
        priority: 'medium',
      },
    ]);
  });

  it('should return a format failure when the model gives no JSON', async () => {
    const { parser } = createHarness(DIGITAL_PAGES, 'I could not extract data.');

    const result = await parser.parse('/uploads/statement.pdf');

    expect(result).toEqual({
      success: false,
      error: 'No JSON object found in AI response',
      error_code: 'response_format',
    });
  });

  it('should return a decode failure with the raw response for malformed JSON', async () => {
    const raw = '{"issuer": "Chase", "card_last4": }';
    const { parser } = createHarness(DIGITAL_PAGES, raw);

    const result = await parser.parse('/uploads/statement.pdf');

    expect(result.success).toBe(false);
    expect(result).toMatchObject({ error_code: 'response_decode', raw_response: raw });
  });

  it('should produce no insights for a zero balance', async () => {
    const reply = modelJson({
      issuer: 'Chase',
      card_last4: '9876',
      statement_date: '2024-02-01',
      due_date: '2024-02-25',
      total_balance: '0',
      minimum_payment: '50',
    });
    const { parser } = createHarness(DIGITAL_PAGES, reply);

    const result = expectSuccess(await parser.parse('/uploads/statement.pdf'));

    expect(result.insights).toEqual([]);
  });

  it('should OCR scanned pages and report them', async () => {
    const pages: FakePage[] = [
      DIGITAL_PAGES[0],
      { embedded: null, ocrText: 'Discover Card Payment Due Date 2024-01-25' },
    ];
    const reply = modelJson({
      issuer: NOT_FOUND,
      card_last4: '1234',
      statement_date: '2024-01-01',
      due_date: '2024-01-25',
      total_balance: NOT_FOUND,
      minimum_payment: NOT_FOUND,
    });
    const { parser, client, ocrEngines } = createHarness(pages, reply);

    const result = expectSuccess(await parser.parse('/uploads/scan.pdf'));

    expect(result.ocr_pages).toEqual([2]);
    expect(result.data.issuer).toBe('Discover');
    expect(result.success_rate).toBe(60);
    expect(result.insights).toEqual([]);
    expect(ocrEngines).toHaveLength(1);
    expect(ocrEngines[0].recognizedPages).toEqual([2]);
    expect(ocrEngines[0].terminated).toBe(true);
    expect(client.requests[0].userPrompt).toContain('Discover Card Payment Due Date 2024-01-25');
  });

  it('should treat an OCR engine that fails to start as an empty page', async () => {
    const pages: FakePage[] = [DIGITAL_PAGES[0], { embedded: null, ocrText: 'unused' }];
    const reply = modelJson({ issuer: 'Chase' });
    const { parser } = createHarness(pages, reply, {
      createOcrEngine: async (): Promise<OcrEngine> => {
        throw new Error('traineddata missing');
      },
    });

    const result = expectSuccess(await parser.parse('/uploads/scan.pdf'));

    expect(result.ocr_pages).toEqual([2]);
    expect(result.success_rate).toBe(0);
  });

  it('should finish the parse and close the document when OCR shutdown fails', async () => {
    const pages: FakePage[] = [
      DIGITAL_PAGES[0],
      { embedded: null, ocrText: 'Chase Sapphire Minimum Payment Due $35.00' },
    ];
    const document = new FakeDocument(pages);
    const parser = new StatementParser({
      loader: new FakeLoader(document),
      createOcrEngine: async (): Promise<OcrEngine> => {
        const engine = new FakeOcr(document);
        return {
          recognize: (image) => engine.recognize(image),
          terminate: async () => {
            throw new Error('worker already gone');
          },
        };
      },
      apiKey: TEST_API_KEY,
      client: new FakeCompletionClient(modelJson({ issuer: 'Chase', minimum_payment: '$35.00' })),
    });

    const result = expectSuccess(await parser.parse('/uploads/scan.pdf'));

    expect(result.ocr_pages).toEqual([2]);
    expect(result.data.minimum_payment).toBe('35.00');
    expect(document.closed).toBe(true);
  });

  it('should fail without calling the model when no text is recoverable', async () => {
    const { parser, client } = createHarness([{ embedded: null }, { embedded: '  ' }], '{}');

    const result = await parser.parse('/uploads/blank.pdf');

    expect(result).toEqual({
      success: false,
      error: 'Could not extract text from PDF',
      error_code: 'no_text',
    });
    expect(client.requests).toHaveLength(0);
  });

  it('should only show the model the first 7000 characters', async () => {
    const longPage: FakePage = { embedded: 'x'.repeat(7000) + 'Minimum Payment Due $99.00' };
    const { parser, client } = createHarness([longPage], modelJson({}));

    await parser.parse('/uploads/long.pdf');

    expect(client.requests[0].userPrompt).not.toContain('Minimum Payment Due');
  });

  it('should throw DocumentReadError for an unreadable PDF', async () => {
    const parser = new StatementParser({
      loader: new FakeLoader(new Error('Invalid PDF structure')),
      createOcrEngine: async () => {
        throw new Error('not needed');
      },
      apiKey: TEST_API_KEY,
      client: new FakeCompletionClient('{}'),
    });

    await expect(parser.parse('/uploads/broken.pdf')).rejects.toThrow(DocumentReadError);
  });

  it('should throw ConfigurationError before touching the document when no key is set', async () => {
    const { parser, client, document } = createHarness(DIGITAL_PAGES, '{}', { apiKey: '' });

    await expect(parser.parse('/uploads/statement.pdf')).rejects.toThrow(ConfigurationError);
    expect(document.extractCalls).toEqual([]);
    expect(client.requests).toHaveLength(0);
  });

  it('should propagate model service failures as UpstreamServiceError', async () => {
    const { parser, client, document } = createHarness(
      DIGITAL_PAGES,
      new Error('connect ECONNREFUSED 127.0.0.1:443')
    );

    await expect(parser.parse('/uploads/statement.pdf')).rejects.toThrow(
      'Model service error: connect ECONNREFUSED 127.0.0.1:443'
    );
    expect(client.requests).toHaveLength(1);
    expect(document.closed).toBe(true);
  });

  it('should produce results that satisfy the parse result contract', async () => {
    const success = await createHarness(
      DIGITAL_PAGES,
      modelJson({ issuer: 'Chase', card_last4: '1234', total_balance: '$12,000', minimum_payment: '$200' })
    ).parser.parse('/uploads/statement.pdf');
    const failure = await createHarness(DIGITAL_PAGES, 'no json here').parser.parse(
      '/uploads/statement.pdf'
    );

    expect(validateParseResult(success)).toEqual({ valid: true });
    expect(validateParseResult(failure)).toEqual({ valid: true });
    expect(validateParseResult({ success: true, data: {} }).valid).toBe(false);
  });
});

describe('toErrorEnvelope', () => {
  it('should carry the error code, message and correlation id', () => {
    const error = new DocumentReadError(new Error('Invalid PDF structure'));

    expect(toErrorEnvelope(error, '01HTESTCORRELATION')).toEqual({
      error: {
        code: 'document_read',
        message: 'Error reading PDF: Invalid PDF structure',
        correlation_id: '01HTESTCORRELATION',
      },
    });
  });
});

describe('UpstreamServiceError', () => {
  it('should keep the upstream cause', () => {
    const cause = new Error('503 Service Unavailable');
    const error = new UpstreamServiceError(cause, 'llama-3.1-8b-instant');

    expect(error.cause).toBe(cause);
    expect(error.model).toBe('llama-3.1-8b-instant');
    expect(error.name).toBe('UpstreamServiceError');
  });
});
