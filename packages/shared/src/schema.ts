export const arenaForgeConfigSchema = {
  type: 'object',
  properties: {
    engine: {
      type: 'object',
      properties: {
        repository: { type: 'string', minLength: 1 },
        directory: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    toolchain: {
      type: 'object',
      properties: {
        minimum: {
          type: 'string',
          pattern: '^\\d+\\.\\d+$',
        },
        pinnedVersion: {
          type: 'string',
          pattern: '^\\d+\\.\\d+\\.\\d+$',
        },
      },
      additionalProperties: false,
    },
    assets: {
      type: 'object',
      properties: {
        version: { type: 'string', minLength: 1 },
        primaryUrl: { type: 'string', pattern: '^https?://' },
        fallbackUrl: { type: 'string', pattern: '^https?://' },
      },
      additionalProperties: false,
    },
    dist: {
      type: 'object',
      properties: {
        directory: { type: 'string', minLength: 1 },
        hunkMegs: { type: 'integer', minimum: 64 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const
