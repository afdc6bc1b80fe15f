/**
 * Library version & build metadata.
 * The version should match package.json.
 */

export const version = '0.1.0'

const detectGitDescribe = (): string | null => {
  const val = process.env.GIT_DESCRIBE || process.env.npm_package_gitHead
  return val ? String(val) : null
}

export const buildMeta = {
  version,
  runtime: `node/${process.versions.node}`,
  gitDescribe: detectGitDescribe()
}

/** Compact UA-style banner sent with every HTTP request. */
export function userAgent(): string {
  const parts = [`contract-courier/${version}`, buildMeta.runtime]
  if (buildMeta.gitDescribe) parts.push(buildMeta.gitDescribe)
  return `${parts[0]} (${parts.slice(1).join('; ')})`
}
