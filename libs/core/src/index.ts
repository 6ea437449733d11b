export * from './core.module';
export * from './env.schema';
export * from './env.utils';
export * from './pair.schema';
export * from './pair-registry.service';
