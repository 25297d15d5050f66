export * from './types'
export * from './tokens'
export * from './errors'
export * from './config'
export * from './lib/log'
export * from './diff'
export * from './classify'
export * from './compress'
export * from './level'
export * from './prompts'
export * from './result'
export * from './client'
export * from './pipeline'
export { renderMarkdown, formatLocation, CATEGORY_LABEL } from './render/md'
