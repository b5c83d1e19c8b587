export * from './Alert'
export * from './Loading'
