export type * from './app'
export type * from './user'
