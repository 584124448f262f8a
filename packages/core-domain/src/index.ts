export * from './entities/manifest-entry';
export * from './entities/manifest';
export * from './entities/upload-candidate';
export * from './entities/remote-object';
export * from './entities/sync-stats';
