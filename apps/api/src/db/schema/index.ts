export * from './users';
export * from './solves';
