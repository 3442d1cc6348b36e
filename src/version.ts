import { readFileSync } from 'node:fs';
import { z } from 'zod';

export type BuildInfo = {
  version: string;
  revision?: string;
  dirty?: boolean;
  buildTime?: string;
};

const PackageSchema = z.object({ version: z.string() });

export function formatVersion({ version, revision = '', dirty = false, buildTime = '' }: BuildInfo): string {
  const meta = revision.slice(0, 7) + (dirty ? '+dirty' : '') + (buildTime ? `, ${buildTime}` : '');
  return meta ? `${version} (${meta})` : version;
}

export function readBuildInfo(env: NodeJS.ProcessEnv = process.env): BuildInfo {
  const pkg = PackageSchema.parse(
    JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  );
  return {
    version: env.APP_VERSION || pkg.version,
    revision: env.GIT_REVISION,
    dirty: env.GIT_DIRTY === 'true',
    buildTime: env.BUILD_TIME
  };
}
