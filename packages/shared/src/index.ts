export * from './types.js'
export { arenaForgeConfigSchema } from './schema.js'
