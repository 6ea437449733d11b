export * from './interfaces';
export * from './models';
export * from './normalizers';
export * from './symbol-mapper';
export * from './spread';
export * from './spread-snapshot.store';
export * from './market-data.module';
export * from './providers/base-rest.provider';
export * from './providers/mexc.provider';
export * from './providers/quanto.provider';
export * from './providers/providers.config';
export * from './utils/concurrency.util';
export * from './utils/http.util';
