import { createServer, IncomingMessage, Server, ServerResponse } from 'node:http';
import { PeppolValidatorClient, UblBuilder } from '../src';
import { PeppolApiError } from '../src/errors';
import { FIXED_ISSUE_DATE, createInvoiceInput, mockTestData } from './testUtils';

/**
 * Runs the client over real HTTP against a validation service stub listening on 127.0.0.1
 */

interface RecordedRequest {
  method?: string;
  path?: string;
  contentType?: string;
  accept?: string;
  apiKey?: string;
  body: string;
}

const REPORTS: Record<string, { contentType: string; body: string; status?: number }> = {
  '/json': { contentType: 'application/json', body: JSON.stringify(mockTestData.mockJsonResponses.validationSuccess) },
  '/json-error': { contentType: 'application/json', body: JSON.stringify(mockTestData.mockJsonResponses.validationError) },
  '/svrl': { contentType: 'application/xml', body: mockTestData.mockXmlResponses.svrlWithFatal },
  '/svrl-warning': { contentType: 'text/xml; charset=utf-8', body: mockTestData.mockXmlResponses.svrlWithWarning },
  '/down': { contentType: 'text/plain', body: 'maintenance', status: 503 },
};

function readBody(request: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    request.on('data', (chunk: Buffer) => chunks.push(chunk));
    request.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    request.on('error', reject);
  });
}

describe('PeppolValidatorClient Integration Tests', () => {
  let server: Server;
  let baseUrl: string;
  let requests: RecordedRequest[];
  let warnSpy: jest.SpyInstance<void, Parameters<typeof console.warn>>;
  const xml = new UblBuilder({ issueDate: FIXED_ISSUE_DATE }).generateInvoiceXml(
    createInvoiceInput({ buyerReference: 'PO-4711' })
  );

  const handle = async (request: IncomingMessage, response: ServerResponse): Promise<void> => {
    const body = await readBody(request);
    requests.push({
      method: request.method,
      path: request.url,
      contentType: request.headers['content-type'],
      accept: request.headers.accept,
      apiKey: typeof request.headers['x-api-key'] === 'string' ? request.headers['x-api-key'] : undefined,
      body,
    });

    const report = REPORTS[request.url ?? ''];
    if (!report) {
      response.writeHead(404, { 'Content-Type': 'text/plain' }).end('no such report');
      return;
    }
    response.writeHead(report.status ?? 200, { 'Content-Type': report.contentType }).end(report.body);
  };

  beforeAll(async () => {
    server = createServer((request, response) => {
      handle(request, response).catch((error: unknown) => {
        response.writeHead(500).end(error instanceof Error ? error.message : 'stub failure');
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Validation stub did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  beforeEach(() => {
    requests = [];
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  test('should post the document and read a JSON report', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/json`, headers: { 'X-Api-Key': 'test-secret' } });

    const result = await client.validateXml(xml);

    expect(result).toEqual({ valid: true, details: 'Validation passed', messages: [] });
    expect(requests).toEqual([
      {
        method: 'POST',
        path: '/json',
        contentType: 'application/xml',
        accept: 'application/json, application/xml',
        apiKey: 'test-secret',
        body: xml,
      },
    ]);
  });

  test('should report the findings of a failed JSON report', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/json-error` });

    const result = await client.validateXml(xml);

    expect(result.valid).toBe(false);
    expect(result.messages.map((message) => message.rule)).toEqual(['BR-CO-15']);
    expect(warnSpy).toHaveBeenCalledWith('[Peppol] Validation failed with 1 finding(s)');
  });

  test('should read an SVRL report with fatal assertions as invalid', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/svrl` });

    const result = await client.validateXml(xml);

    expect(result.valid).toBe(false);
    expect(result.details).toBe(
      '[BR-CO-15] Totals do not add up.\n[BR-21] Each Invoice line shall have an Invoice line identifier.'
    );
  });

  test('should read an SVRL report with warnings only as valid', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/svrl-warning` });

    const result = await client.validateXml(xml);

    expect(result.valid).toBe(true);
    expect(result.messages.map((message) => message.flag)).toEqual(['warning']);
  });

  test('should surface service failures', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/down` });

    await expect(client.validateXml(xml)).rejects.toThrow(new PeppolApiError('HTTP 503: Service Unavailable - maintenance'));
  });

  test('should report a malformed document without contacting the service', async () => {
    const client = new PeppolValidatorClient({ url: `${baseUrl}/json` });

    const result = await client.validateXml('<Invoice>');

    expect(result.valid).toBe(false);
    expect(result.details).toBe('Malformed xml document');
    expect(requests).toEqual([]);
  });
});
