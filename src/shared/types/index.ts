export type * from './config'
export type * from './diff'
export type * from './git'
export type * from './report'
export type * from './sequencer'
export type * from './status'
