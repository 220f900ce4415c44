export const name = '@pplaces/core';

export * from './config/loader';
export * from './lifecycle';
