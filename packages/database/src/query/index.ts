export * from './translation-query.builder'
export * from './translation-query.sql'
export * from './translation-query.matcher'
