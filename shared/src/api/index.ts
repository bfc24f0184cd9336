export { ARemoteDataSource } from './ARemoteDataSource.js';
export { HttpRemoteDataSource, type HttpRemoteDataSourceConfig } from './HttpRemoteDataSource.js';
export * from './schemas.js';
