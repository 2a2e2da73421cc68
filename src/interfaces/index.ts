export * from './intent.interface';
export * from './classifier.interface';
export * from './operation.interface';
export * from './session.interface';
export * from './backend.interface';
