/**
 * Semantic version comparison
 */

interface ParsedVersion {
  release: number[];
  prerelease: string[];
}

function parseVersion(version: string): ParsedVersion {
  const cleaned = version.trim().replace(/^v/i, '').split('+')[0];
  const dash = cleaned.indexOf('-');
  const core = dash === -1 ? cleaned : cleaned.slice(0, dash);
  const pre = dash === -1 ? '' : cleaned.slice(dash + 1);

  return {
    release: core.split('.').map((part) => {
      const n = parseInt(part, 10);
      return isNaN(n) ? 0 : n;
    }),
    prerelease: pre ? pre.split('.') : [],
  };
}

function compareIdentifiers(a: string, b: string): number {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) return Math.sign(Number(a) - Number(b));
  if (aNum) return -1;
  if (bNum) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * -1 if a < b, 0 if equal, 1 if a > b.
 * A leading 'v' and build metadata are ignored; 1.2.0-rc.1 < 1.2.0.
 */
export function compareVersions(a: string, b: string): number {
  const va = parseVersion(a);
  const vb = parseVersion(b);

  const length = Math.max(va.release.length, vb.release.length);
  for (let i = 0; i < length; i++) {
    const diff = (va.release[i] ?? 0) - (vb.release[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }

  if (va.prerelease.length === 0 && vb.prerelease.length === 0) return 0;
  if (va.prerelease.length === 0) return 1;
  if (vb.prerelease.length === 0) return -1;

  const preLength = Math.max(va.prerelease.length, vb.prerelease.length);
  for (let i = 0; i < preLength; i++) {
    const left = va.prerelease[i];
    const right = vb.prerelease[i];
    if (left === undefined) return -1;
    if (right === undefined) return 1;
    const cmp = compareIdentifiers(left, right);
    if (cmp !== 0) return cmp;
  }
  return 0;
}

export function isNewerVersion(candidate: string, current: string): boolean {
  return compareVersions(candidate, current) > 0;
}
