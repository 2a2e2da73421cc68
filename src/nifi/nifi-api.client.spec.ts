import { NifiApiClient } from './nifi-api.client';
import { NifiConnectionConfig } from '../config/gateway.config';
import { BackendOperationError } from '../interfaces';

const BASE_URL = 'http://nifi.test/nifi-api';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

function createClient(overrides: Partial<NifiConnectionConfig> = {}): NifiApiClient {
  return new NifiApiClient(
    { baseUrl: BASE_URL, timeoutMs: 1000, maxRetries: 3, ...overrides },
    { initialDelayMs: 1, maxDelayMs: 2 },
  );
}

describe('NifiApiClient', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  function callAt(index: number): { url: string; init: RequestInit | undefined } {
    const [url, init] = fetchMock.mock.calls[index];
    return { url: String(url), init };
  }

  describe('reads', () => {
    it('should parse process groups from the group flow', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          processGroupFlow: {
            flow: {
              processGroups: [
                {
                  component: { id: 'pg-1', name: 'Ingest', comments: 'raw data' },
                  status: { aggregateSnapshot: { flowFilesQueued: 4, bytesQueued: 2048, runningCount: 3 } },
                },
              ],
            },
          },
        }),
      );

      const groups = await createClient().getProcessGroups('root');

      expect(callAt(0).url).toBe(`${BASE_URL}/flow/process-groups/root`);
      expect(callAt(0).init?.method).toBe('GET');
      expect(groups).toEqual([
        {
          id: 'pg-1',
          name: 'Ingest',
          comments: 'raw data',
          flowFileCount: 4,
          flowFileSize: 2048,
          runningCount: 3,
          stoppedCount: 0,
          invalidCount: 0,
          disabledCount: 0,
        },
      ]);
    });

    it('should parse processors with their relationships', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          processGroupFlow: {
            flow: {
              processors: [
                {
                  component: {
                    id: 'p-1',
                    name: 'Read',
                    type: 'org.apache.nifi.processors.standard.GetFile',
                    state: 'STOPPED',
                    config: { properties: { 'Input Directory': '/in' } },
                    relationships: [{ name: 'success', autoTerminate: false }],
                  },
                  status: { runStatus: 'Stopped' },
                },
              ],
            },
          },
        }),
      );

      const [processor] = await createClient().getProcessors('pg-1');

      expect(processor).toMatchObject({
        id: 'p-1',
        name: 'Read',
        processorType: 'org.apache.nifi.processors.standard.GetFile',
        runStatus: 'Stopped',
        properties: { 'Input Directory': '/in' },
        relationships: ['success'],
        validationErrors: [],
      });
    });

    it('should treat a flow without connections as empty', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ processGroupFlow: { flow: {} } }));
      await expect(createClient().getConnections('root')).resolves.toEqual([]);
    });

    it('should map search results by component kind', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          searchResultsDTO: {
            processorResults: [{ id: 'p-1', name: 'ConsumeKafka' }],
            processGroupResults: [],
          },
        }),
      );

      const results = await createClient().searchComponents('kafka topics');

      expect(callAt(0).url).toBe(`${BASE_URL}/flow/search-results?q=kafka%20topics`);
      expect(results.processors).toEqual([{ id: 'p-1', name: 'ConsumeKafka' }]);
      expect(results.funnels).toEqual([]);
    });

    it('should fall back to the processor-type entry when docs are unavailable', async () => {
      const entry = {
        type: 'org.apache.nifi.processors.standard.GetFile',
        bundle: { group: 'org.apache.nifi', artifact: 'nifi-standard-nar', version: '1.20.0' },
        description: 'Reads files',
      };
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ processorTypes: [entry] }))
        .mockResolvedValueOnce(textResponse('not found', 404));

      const docs = await createClient().getProcessorDocumentation('org.apache.nifi.processors.standard.GetFile');

      expect(callAt(1).url).toBe(
        `${BASE_URL}/extension-repository/org.apache.nifi/nifi-standard-nar/1.20.0/extensions/GetFile/docs`,
      );
      expect(docs).toEqual(entry);
    });

    it('should encode every segment of the docs path', async () => {
      fetchMock
        .mockResolvedValueOnce(
          jsonResponse({
            processorTypes: [
              {
                type: 'com.example.Custom Reader',
                bundle: { group: 'com.example', artifact: 'nar/readers', version: '2.0 beta' },
              },
            ],
          }),
        )
        .mockResolvedValueOnce(jsonResponse({ tags: ['custom'] }));

      const docs = await createClient().getProcessorDocumentation('com.example.Custom Reader');

      expect(callAt(1).url).toBe(
        `${BASE_URL}/extension-repository/com.example/nar%2Freaders/2.0%20beta/extensions/Custom%20Reader/docs`,
      );
      expect(docs).toEqual({ tags: ['custom'] });
    });
  });

  describe('writes', () => {
    it('should post a new process group with a zero revision', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ component: { id: 'pg-2', name: 'ETL Pipeline' } }, 201));

      const group = await createClient().createProcessGroup('root', 'ETL Pipeline');

      const { url, init } = callAt(0);
      expect(url).toBe(`${BASE_URL}/process-groups/root/process-groups`);
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({
        revision: { version: 0 },
        component: { name: 'ETL Pipeline', position: { x: 0, y: 0 } },
      });
      expect(group).toEqual({ id: 'pg-2', name: 'ETL Pipeline', comments: undefined });
    });

    it('should set a process group running', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'pg-1', state: 'RUNNING' }));

      await createClient().startProcessGroup('pg-1');

      const { url, init } = callAt(0);
      expect(url).toBe(`${BASE_URL}/flow/process-groups/pg-1`);
      expect(init?.method).toBe('PUT');
      expect(JSON.parse(String(init?.body))).toEqual({ id: 'pg-1', state: 'RUNNING' });
    });

    it('should send the current revision when changing processor state', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ revision: { version: 3, clientId: 'c-1' }, component: { id: 'p-1' } }))
        .mockResolvedValueOnce(jsonResponse({}));

      await createClient().stopProcessor('p-1');

      expect(callAt(0).url).toBe(`${BASE_URL}/processors/p-1`);
      const { url, init } = callAt(1);
      expect(url).toBe(`${BASE_URL}/processors/p-1/run-status`);
      expect(JSON.parse(String(init?.body))).toEqual({ revision: { version: 3, clientId: 'c-1' }, state: 'STOPPED' });
    });
  });

  describe('retries', () => {
    it('should retry a read after transport failures', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ processorTypes: [{ type: 'a' }] }));

      await expect(createClient().getProcessorTypes()).resolves.toEqual([{ type: 'a' }]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should retry a read whose body times out', async () => {
      const stalled = jsonResponse({ templates: [] });
      const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      jest.spyOn(stalled, 'text').mockRejectedValueOnce(timeout);
      fetchMock
        .mockResolvedValueOnce(stalled)
        .mockResolvedValueOnce(jsonResponse({ templates: [{ template: { id: 't-1', name: 'Ingest' } }] }));

      const templates = await createClient().getTemplates();

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(templates).toMatchObject([{ id: 't-1', name: 'Ingest' }]);
    });

    it('should give up after the configured number of retries', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const error = await createClient({ maxRetries: 2 })
        .getTemplates()
        .catch((e: unknown) => e);

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(error).toBeInstanceOf(BackendOperationError);
      expect(error).toMatchObject({ transient: true, message: 'GET /flow/templates failed: fetch failed' });
    });

    it('should not retry a write', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(createClient().createProcessGroup('root', 'X')).rejects.toBeInstanceOf(BackendOperationError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should not retry an error status', async () => {
      fetchMock.mockResolvedValue(textResponse('boom', 500));

      const error = await createClient()
        .getSystemDiagnostics()
        .catch((e: unknown) => e);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(error).toMatchObject({
        statusCode: 500,
        transient: false,
        message: 'GET /system-diagnostics returned 500 - boom',
      });
    });
  });

  describe('connect', () => {
    it('should skip authentication without credentials', async () => {
      const client = createClient();
      await client.connect();

      expect(fetchMock).not.toHaveBeenCalled();
      expect(client.isAuthenticated()).toBe(false);
    });

    it('should exchange credentials for a bearer token', async () => {
      fetchMock
        .mockResolvedValueOnce(textResponse('test-token', 201))
        .mockResolvedValueOnce(jsonResponse({ systemDiagnostics: {} }));
      const client = createClient({ username: 'operator', password: 'test-secret' });

      await client.connect();
      await client.getSystemDiagnostics();

      const auth = callAt(0);
      expect(auth.url).toBe(`${BASE_URL}/access/token`);
      expect(auth.init?.method).toBe('POST');
      expect(String(auth.init?.body)).toBe('username=operator&password=test-secret');
      expect(callAt(1).init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
      expect(client.isAuthenticated()).toBe(true);
    });

    it('should reject bad credentials', async () => {
      fetchMock.mockResolvedValueOnce(textResponse('unauthorized', 401));
      const client = createClient({ username: 'operator', password: 'wrong' });

      await expect(client.connect()).rejects.toMatchObject({ statusCode: 401 });
    });
  });

  describe('healthCheck', () => {
    it('should report true when diagnostics respond', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ systemDiagnostics: {} }));
      await expect(createClient().healthCheck()).resolves.toBe(true);
    });

    it('should report false instead of throwing', async () => {
      fetchMock.mockResolvedValue(textResponse('down', 503));
      await expect(createClient().healthCheck()).resolves.toBe(false);
    });
  });
});
