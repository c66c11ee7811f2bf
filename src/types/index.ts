export * from './transcript';
export * from './tool';
export * from './agent';
export * from './config';
