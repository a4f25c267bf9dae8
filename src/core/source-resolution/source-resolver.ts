import { PackageRef, ModuleOrigin, ResolvedSources, SourceCandidate, FetchSettings } from '../../types/index.js';
import { HttpTransport } from '../fetch/http-transport.js';
import { isPrivateModule } from '../privacy-matcher.js';
import { isFullCommitHash } from '../version-classifier.js';
import {
  OriginProvider,
  CommandRunner,
  createProxyInfoProvider,
  createRegistryToolProvider,
  createVersionInferenceProvider,
  lookupOrigin
} from './origin-providers.js';
import { escapePath, escapeVersion, extractHost, formatRef } from '../../utils/module-path.js';
import { ARCHIVE_EXTENSION } from '../../constants/index.js';
import { ResolutionError, ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Source resolution: turn a module reference into the ordered list of places
 * its archive can be downloaded from.
 *
 * Order: shared proxy (public modules only), pinned commit, tag/branch/commit
 * archive, registry path. A pinned commit beats a tag archive because tags
 * can be moved upstream; a commit cannot.
 */

type SourceResolverSettings = Pick<FetchSettings, 'proxy' | 'privatePatterns' | 'vcsHosts' | 'registryTool' | 'requestTimeoutMs'>;

export interface SourceResolverDeps {
  transport: HttpTransport;
  /** Runs the registry tool; defaults to spawning it */
  runCommand?: CommandRunner;
  /** Replaces the provider chains entirely */
  originProviders?: {
    public: readonly OriginProvider[];
    private: readonly OriginProvider[];
  };
}

export interface SourceResolver {
  isPrivate(path: string): boolean;
  resolve(ref: PackageRef): Promise<ResolvedSources>;
}

const GENERATION_NAMESPACE = /\/gen\/[^/]+\//;

export function buildProxyUrl(proxy: string, ref: PackageRef): string {
  return `${proxy}/${escapePath(ref.path)}/@v/${escapeVersion(ref.version)}${ARCHIVE_EXTENSION}`;
}

/**
 * Registry endpoint on the module's own host. Schema registries nest the
 * whole module path under their generation namespace.
 */
export function buildRegistryPathUrl(ref: PackageRef): string {
  const host = extractHost(ref.path);
  const escapedPath = escapePath(ref.path);
  const escapedVersion = escapeVersion(ref.version);
  const namespace = GENERATION_NAMESPACE.exec(ref.path);
  if (namespace) {
    return `https://${host}${namespace[0]}${escapedPath}/@v/${escapedVersion}${ARCHIVE_EXTENSION}`;
  }
  return `https://${host}/${escapedPath}/@v/${escapedVersion}${ARCHIVE_EXTENSION}`;
}

/**
 * Archive URL for the ref or commit an origin names, or null when it names neither.
 */
export function buildArchiveUrl(origin: ModuleOrigin): string | null {
  const ref = origin.ref ?? '';
  for (const refType of ['tags', 'heads'] as const) {
    const prefix = `refs/${refType}/`;
    if (ref.startsWith(prefix)) {
      const name = ref.slice(prefix.length);
      return `${origin.repoUrl}/archive/refs/${refType}/${encodeURIComponent(name)}${ARCHIVE_EXTENSION}`;
    }
  }
  if (origin.commitHash) {
    return `${origin.repoUrl}/archive/${origin.commitHash}${ARCHIVE_EXTENSION}`;
  }
  return null;
}

/**
 * Version-control candidates for an origin: pinned commit first when the
 * full hash is known, then the ref or commit archive.
 */
export function buildVcsCandidates(origin: ModuleOrigin, authHost: string): SourceCandidate[] {
  const candidates: SourceCandidate[] = [];

  if (isFullCommitHash(origin.commitHash)) {
    candidates.push({
      kind: 'vcs-pinned-commit',
      url: `${origin.repoUrl}/archive/${origin.commitHash}${ARCHIVE_EXTENSION}`,
      authHost,
      pinnedCommit: origin.commitHash
    });
  }

  const archiveUrl = buildArchiveUrl(origin);
  if (archiveUrl && !candidates.some(candidate => candidate.url === archiveUrl)) {
    candidates.push({ kind: 'vcs-archive', url: archiveUrl, authHost });
  }

  return candidates;
}

export function createSourceResolver(settings: SourceResolverSettings, deps: SourceResolverDeps): SourceResolver {
  const vcsHosts = new Set(settings.vcsHosts);
  const proxyHost = settings.proxy ? parseProxyHost(settings.proxy) : '';
  const chains = deps.originProviders ?? buildDefaultChains(settings, deps);

  const isPrivate = (path: string): boolean => isPrivateModule(settings.privatePatterns, path);

  return {
    isPrivate,

    async resolve(ref: PackageRef): Promise<ResolvedSources> {
      const host = extractHost(ref.path);
      if (!ref.path || !host) {
        throw new ResolutionError(ref, 'module path has no host');
      }
      if (!ref.version) {
        throw new ResolutionError(ref, 'empty version');
      }

      const privateModule = isPrivate(ref.path);
      const candidates: SourceCandidate[] = [];

      if (settings.proxy && !privateModule) {
        candidates.push({ kind: 'proxy', url: buildProxyUrl(settings.proxy, ref), authHost: proxyHost });
      }

      let origin: ModuleOrigin | undefined;
      if (vcsHosts.has(host)) {
        const found = await lookupOrigin(ref, privateModule ? chains.private : chains.public);
        if (found) {
          origin = found.origin;
          candidates.push(...buildVcsCandidates(found.origin, host));
        }
      }

      const hasVcsCandidate = candidates.some(candidate => candidate.kind !== 'proxy');
      if (!hasVcsCandidate) {
        // No usable provenance: the module's own host is the last resort
        candidates.push({ kind: 'registry-path', url: buildRegistryPathUrl(ref), authHost: host });
      }

      logger.debug(`Resolved ${candidates.length} source(s) for ${formatRef(ref)}`, {
        private: privateModule,
        candidates: candidates.map(candidate => `${candidate.kind} ${candidate.url}`)
      });

      return {
        ref,
        isPrivate: privateModule,
        candidates,
        ...(origin ? { origin } : {})
      };
    }
  };
}

function parseProxyHost(proxy: string): string {
  try {
    return new URL(proxy).hostname;
  } catch {
    throw new ConfigError(`Invalid proxy URL: ${proxy}`, { proxy });
  }
}

function buildDefaultChains(
  settings: SourceResolverSettings,
  deps: SourceResolverDeps
): { public: OriginProvider[]; private: OriginProvider[] } {
  const registryTool = settings.registryTool
    ? [createRegistryToolProvider(settings.registryTool, deps.runCommand)]
    : [];
  const inference = createVersionInferenceProvider();
  const proxyInfo = settings.proxy
    ? [createProxyInfoProvider(settings.proxy, deps.transport, settings.requestTimeoutMs)]
    : [];

  return {
    public: [...proxyInfo, ...registryTool, inference],
    private: [...registryTool, inference]
  };
}
