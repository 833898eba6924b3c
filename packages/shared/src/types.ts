export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}

export type PipelineErrorKind = 'usage' | 'environment' | 'acquisition' | 'build' | 'artifact'

export interface PipelineError {
  kind: PipelineErrorKind
  message: string
}

export type Platform = 'macos' | 'linux'

export interface ToolchainSpec {
  command: string
  minimum: { major: number; minor: number }
  pinnedVersion: string
}

export interface ToolVersion {
  major: number
  minor: number
  patch: number
}

export interface ArtifactPattern {
  kind: 'file' | 'directory'
  name: string
  // Required trailing path segments, e.g. baseq3/vm/qagame.qvm
  pathSuffix?: string
}

export interface BuildTarget {
  label: string
  sourceDir: string
  buildDir: string
  targets?: string[]
}

export interface AssetSource {
  name: string
  version: string
  primaryUrl: string
  fallbackUrl: string
  archivePath: string
  extractDir: string
  profileDirName: string
  packageExtension: string
}

export type ProfileClass =
  | { kind: 'base' }
  | { kind: 'mod'; name: string }
  | { kind: 'none' }

export interface Profile {
  name: string
  directory: string
  classification: ProfileClass
}

export const MOD_VARIANTS = ['default', 'debug-visible'] as const
export type ModVariant = typeof MOD_VARIANTS[number]

export interface ModSpec {
  name: string
  variant: ModVariant
  mainMenuImage?: string
}

export type CvarVerb = 'seta' | 'set'

export interface CvarDirective {
  verb: CvarVerb
  key: string
  value: string
}

export interface ArenaForgeConfigFile {
  engine?: {
    repository?: string
    directory?: string
  }
  toolchain?: {
    minimum?: string
    pinnedVersion?: string
  }
  assets?: {
    version?: string
    primaryUrl?: string
    fallbackUrl?: string
  }
  dist?: {
    directory?: string
    hunkMegs?: number
  }
}
