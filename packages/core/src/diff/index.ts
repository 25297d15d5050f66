export * from './hunk'
export * from './parse'
