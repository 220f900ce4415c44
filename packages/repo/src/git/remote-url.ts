const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
// user@host:owner/repo (no scheme, colon before the first slash; `C:\` is a drive)
const SCP_PATTERN = /^(?:[^@/]+@)?([^:/\\]{2,}):(?!\/)(.+)$/;

function stripGitSuffix(p: string): string {
  return p.replace(/\/+$/, '').replace(/\.git$/, '');
}

interface RemoteParts {
  /** Lowercased host; absent for local paths */
  host?: string;
  path: string;
}

function splitRemote(url: string): RemoteParts {
  const trimmed = url.trim();

  if (SCHEME_PATTERN.test(trimmed)) {
    try {
      const parsed = new URL(trimmed);
      if (parsed.protocol === 'file:') {
        return { path: stripGitSuffix(decodeURIComponent(parsed.pathname)) };
      }
      return {
        host: parsed.hostname.toLowerCase(),
        path: stripGitSuffix(decodeURIComponent(parsed.pathname).replace(/^\/+/, '')),
      };
    } catch {
      return { path: stripGitSuffix(trimmed) };
    }
  }

  const scp = SCP_PATTERN.exec(trimmed);
  if (scp) {
    const [, host, repoPath] = scp;
    return { host: host.toLowerCase(), path: stripGitSuffix(repoPath.replace(/^\/+/, '')) };
  }

  return { path: stripGitSuffix(trimmed) };
}

/**
 * Reduces a remote URL to `host/owner/repo` so that the https, ssh and
 * scp-style spellings of the same remote compare equal. Credentials, ports,
 * a trailing slash and the `.git` suffix are dropped and the host is
 * lowercased. Local paths are returned without the `.git` suffix.
 */
export function normalizeRemoteUrl(url: string): string {
  const { host, path } = splitRemote(url);
  return host === undefined ? path : `${host}/${path}`;
}

/**
 * True when two remote URLs point at the same repository.
 */
export function sameRemote(a: string, b: string): boolean {
  return normalizeRemoteUrl(a) === normalizeRemoteUrl(b);
}

/**
 * The directory name `git clone` would pick for a URL: its last path
 * segment without `.git`.
 */
export function repoNameFromUrl(url: string): string | undefined {
  const segments = splitRemote(url).path.split(/[/\\]/).filter(Boolean);
  return segments[segments.length - 1];
}
