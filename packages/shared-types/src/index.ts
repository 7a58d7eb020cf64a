export * from './common-errors'
export * from './auth-errors'
export * from './auth'
export * from './auth-server-config'
export * from './health'
