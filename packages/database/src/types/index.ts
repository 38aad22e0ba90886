export * from './translation.types'
