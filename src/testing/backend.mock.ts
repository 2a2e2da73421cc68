import { OperationsBackend } from '../interfaces';

/**
 * jest double for the operations backend: every read returns an empty
 * result, every write resolves
 */
export function createMockBackend(): jest.Mocked<OperationsBackend> {
  return {
    connect: jest.fn().mockResolvedValue(undefined),
    healthCheck: jest.fn().mockResolvedValue(true),
    getProcessGroups: jest.fn().mockResolvedValue([]),
    createProcessGroup: jest.fn(),
    startProcessGroup: jest.fn().mockResolvedValue(undefined),
    stopProcessGroup: jest.fn().mockResolvedValue(undefined),
    getProcessors: jest.fn().mockResolvedValue([]),
    createProcessor: jest.fn(),
    startProcessor: jest.fn().mockResolvedValue(undefined),
    stopProcessor: jest.fn().mockResolvedValue(undefined),
    getConnections: jest.fn().mockResolvedValue([]),
    createConnection: jest.fn(),
    getTemplates: jest.fn().mockResolvedValue([]),
    createTemplate: jest.fn(),
    instantiateTemplate: jest.fn().mockResolvedValue({}),
    searchComponents: jest.fn().mockResolvedValue({
      processors: [],
      processGroups: [],
      connections: [],
      inputPorts: [],
      outputPorts: [],
      remoteProcessGroups: [],
      funnels: [],
    }),
    getSystemDiagnostics: jest.fn().mockResolvedValue({}),
    getControllerStatus: jest.fn().mockResolvedValue({}),
    getProcessorTypes: jest.fn().mockResolvedValue([]),
    getProcessorDocumentation: jest.fn().mockResolvedValue({}),
  };
}

/** Total number of backend calls made so far */
export function backendCallCount(backend: jest.Mocked<OperationsBackend>): number {
  return Object.values(backend).reduce((sum, fn) => sum + fn.mock.calls.length, 0);
}
