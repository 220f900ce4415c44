export * from './types';
export * from './clients';
export * from './outcome';
export * from './clone';
export * from './upload';
