import { execFile } from 'child_process';
import { promisify } from 'util';
import { PackageRef, ModuleOrigin, RegistryToolConfig } from '../../types/index.js';
import { HttpTransport } from '../fetch/http-transport.js';
import { classifyVersion } from '../version-classifier.js';
import { escapePath, escapeVersion, extractHost, formatRef } from '../../utils/module-path.js';
import { INFO_EXTENSION } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';

const execFileAsync = promisify(execFile);

/**
 * Sources of version-control provenance for a module. Each provider is tried
 * in turn; the first one returning a usable origin wins. A provider returns
 * null when it has nothing to say and throws only on real failures, which
 * the chain logs and skips.
 */
export type OriginProvider = {
  readonly name: string;
  lookup(ref: PackageRef): Promise<ModuleOrigin | null>;
};

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { maxBuffer: 4 * 1024 * 1024 });
  return stdout;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read the `Origin` block of a module info document:
 *
 *   { "Version": "v1.2.3", "Origin": { "VCS": "git", "URL": "...", "Ref": "...", "Hash": "..." } }
 */
export function parseModuleInfo(document: unknown): ModuleOrigin | null {
  if (!isRecord(document) || !isRecord(document.Origin)) {
    return null;
  }
  const origin = document.Origin;
  const vcs = optionalString(origin.VCS);
  const repoUrl = optionalString(origin.URL);
  if (!vcs || !repoUrl) {
    return null;
  }
  const ref = optionalString(origin.Ref);
  const commitHash = optionalString(origin.Hash);
  return {
    vcs,
    repoUrl,
    ...(ref ? { ref } : {}),
    ...(commitHash ? { commitHash } : {})
  };
}

export function normalizeRepoUrl(url: string): string {
  return url.replace(/\/+$/, '').replace(/\.git$/, '');
}

/**
 * An origin is usable when it is a git repository on the module's own host
 * and names either a ref or a commit.
 */
export function isUsableOrigin(origin: ModuleOrigin, host: string): boolean {
  return origin.vcs === 'git'
    && origin.repoUrl.startsWith(`https://${host}/`)
    && (origin.ref !== undefined || origin.commitHash !== undefined);
}

/**
 * Metadata endpoint of the shared proxy. Needs no credentials and is only
 * consulted for public modules.
 */
export function createProxyInfoProvider(proxy: string, transport: HttpTransport, timeoutMs: number): OriginProvider {
  return {
    name: 'proxy-info',
    async lookup(ref: PackageRef): Promise<ModuleOrigin | null> {
      const infoUrl = `${proxy}/${escapePath(ref.path)}/@v/${escapeVersion(ref.version)}${INFO_EXTENSION}`;
      const response = await transport.get(infoUrl, { timeoutMs, accept: 'application/json' });
      if (response.status !== 200) {
        logger.debug(`Proxy metadata unavailable for ${formatRef(ref)} (HTTP ${response.status})`);
        return null;
      }
      const document: unknown = JSON.parse(Buffer.from(response.body).toString('utf8'));
      return parseModuleInfo(document);
    }
  };
}

/**
 * Locally configured registry tool. It runs with the operator's own
 * credentials, so it is the one metadata source that works for private
 * modules and it reports the full commit hash.
 */
export function createRegistryToolProvider(tool: RegistryToolConfig, run: CommandRunner = runCommand): OriginProvider {
  return {
    name: 'registry-tool',
    async lookup(ref: PackageRef): Promise<ModuleOrigin | null> {
      const moduleArg = formatRef(ref);
      const args = (tool.args ?? []).map(arg => arg.split('{module}').join(moduleArg));
      if (!args.some(arg => arg.includes(moduleArg))) {
        args.push(moduleArg);
      }
      const stdout = await run(tool.command, args);
      return parseModuleInfo(JSON.parse(stdout));
    }
  };
}

/**
 * Provenance inferred from the module path and version alone: snapshots carry
 * an abbreviated commit, tags map to refs/tags/<version>.
 */
export function createVersionInferenceProvider(): OriginProvider {
  return {
    name: 'version-inference',
    async lookup(ref: PackageRef): Promise<ModuleOrigin | null> {
      const segments = ref.path.split('/');
      if (segments.length < 3 || !segments[1] || !segments[2]) {
        return null;
      }
      const repoUrl = `https://${extractHost(ref.path)}/${segments[1]}/${segments[2]}`;

      const versionClass = classifyVersion(ref.version);
      if (versionClass.kind === 'snapshot') {
        return versionClass.commitPrefix
          ? { vcs: 'git', repoUrl, commitHash: versionClass.commitPrefix }
          : null;
      }
      return versionClass.name
        ? { vcs: 'git', repoUrl, ref: `refs/tags/${versionClass.name}` }
        : null;
    }
  };
}

/**
 * Run providers in order and return the first usable origin.
 */
export async function lookupOrigin(
  ref: PackageRef,
  providers: readonly OriginProvider[]
): Promise<{ origin: ModuleOrigin; provider: string } | null> {
  const host = extractHost(ref.path);

  for (const provider of providers) {
    let origin: ModuleOrigin | null;
    try {
      origin = await provider.lookup(ref);
    } catch (error) {
      logger.debug(`Origin provider ${provider.name} failed for ${formatRef(ref)}: ${errorMessage(error)}`);
      continue;
    }

    if (!origin) {
      continue;
    }

    const normalized = { ...origin, repoUrl: normalizeRepoUrl(origin.repoUrl) };
    if (!isUsableOrigin(normalized, host)) {
      logger.debug(`Ignoring origin from ${provider.name} for ${formatRef(ref)}`, normalized);
      continue;
    }

    logger.debug(`Resolved origin of ${formatRef(ref)} via ${provider.name}`, normalized);
    return { origin: normalized, provider: provider.name };
  }

  return null;
}
