export * from './burnPipeline';
