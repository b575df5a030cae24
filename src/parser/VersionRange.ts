/**
 * Best-effort bounds of a version constraint.
 *
 * Understands npm ranges (^, ~, comparators, hyphen ranges, x-ranges, ||),
 * PEP 440 specifiers (==, ~=, >=, <, != is ignored) and Maven ranges
 * ([1.0,2.0)). An exact version yields min = max = that version.
 */
export interface VersionBounds {
    minVersion: string; // "" when there is no lower bound
    maxVersion: string; // "" when there is no upper bound
}

interface VersionParts {
    major: number;
    minor?: number;
    patch?: number;
    wildcard: boolean; // "1.x", "1.2.*"
}

const UNBOUNDED: VersionBounds = { minVersion: '', maxVersion: '' };
const ANY_VERSION = new Set(['', '*', 'x', 'X', 'latest']);
const WILDCARD = /^[xX*]$/;

function parseParts(version: string): VersionParts | undefined {
    const match = /^v?(\d+)(?:\.(\d+|[xX*]))?(?:\.(\d+|[xX*]))?/.exec(version);
    if (!match) {
        return undefined;
    }
    const [, major, minor, patch] = match;
    const wildcard = [minor, patch].some((part) => part !== undefined && WILDCARD.test(part));
    const toNumber = (part: string | undefined) =>
        part === undefined || WILDCARD.test(part) ? undefined : Number(part);
    return { major: Number(major), minor: toNumber(minor), patch: toNumber(patch), wildcard };
}

function caretUpper({ major, minor, patch }: VersionParts): string {
    if (major > 0 || minor === undefined) {
        return `${major + 1}.0.0`;
    }
    if (minor > 0 || patch === undefined) {
        return `0.${minor + 1}.0`;
    }
    return `0.0.${patch + 1}`;
}

function tildeUpper({ major, minor }: VersionParts): string {
    return minor === undefined ? `${major + 1}.0.0` : `${major}.${minor + 1}.0`;
}

function wildcardBounds(parts: VersionParts): VersionBounds {
    const { major, minor } = parts;
    if (minor === undefined) {
        return { minVersion: `${major}.0.0`, maxVersion: `${major + 1}.0.0` };
    }
    return { minVersion: `${major}.${minor}.0`, maxVersion: `${major}.${minor + 1}.0` };
}

// PEP 440 "~=1.4.2" means ">=1.4.2, ==1.4.*"
function compatibleUpper(version: string): string {
    const release = version.split('.').filter((segment) => /^\d+$/.test(segment));
    if (release.length < 2) {
        return '';
    }
    const prefix = release.slice(0, -1).map(Number);
    prefix[prefix.length - 1] += 1;
    return prefix.join('.');
}

function applyComparator(token: string, bounds: VersionBounds): void {
    const match = /^(===|==|~=|<=|>=|!=|\^|~>?|<|>|=)?(.*)$/.exec(token);
    if (!match) {
        return;
    }
    const operator = match[1] ?? '';
    const version = match[2];
    if (ANY_VERSION.has(version)) {
        return;
    }
    const parts = parseParts(version);

    switch (operator) {
        case '^':
            bounds.minVersion = version;
            bounds.maxVersion = parts ? caretUpper(parts) : '';
            return;
        case '~':
        case '~>':
            bounds.minVersion = version;
            bounds.maxVersion = parts ? tildeUpper(parts) : '';
            return;
        case '~=':
            bounds.minVersion = version;
            bounds.maxVersion = compatibleUpper(version);
            return;
        case '>=':
        case '>':
            bounds.minVersion = version;
            return;
        case '<=':
        case '<':
            bounds.maxVersion = version;
            return;
        case '!=':
            return;
        default:
            if (!parts) {
                // tags, URLs and other non-numeric references carry no bounds
                return;
            }
            if (parts.wildcard) {
                Object.assign(bounds, wildcardBounds(parts));
            } else {
                bounds.minVersion = version;
                bounds.maxVersion = version;
            }
    }
}

export function parseConstraint(constraint: string): VersionBounds {
    const trimmed = constraint.trim();
    if (ANY_VERSION.has(trimmed)) {
        return { ...UNBOUNDED };
    }

    if (trimmed.includes('||')) {
        const alternatives = trimmed.split('||').map(parseConstraint);
        return {
            minVersion: alternatives[0].minVersion,
            maxVersion: alternatives[alternatives.length - 1].maxVersion,
        };
    }

    const mavenRange = /^[[(]\s*([^,]*?)\s*,\s*([^,]*?)\s*[\])]$/.exec(trimmed);
    if (mavenRange) {
        return { minVersion: mavenRange[1], maxVersion: mavenRange[2] };
    }
    const mavenExact = /^\[\s*([^,\]]+?)\s*\]$/.exec(trimmed);
    if (mavenExact) {
        return { minVersion: mavenExact[1], maxVersion: mavenExact[1] };
    }

    const hyphen = /^(\S+)\s+-\s+(\S+)$/.exec(trimmed);
    if (hyphen) {
        return { minVersion: hyphen[1], maxVersion: hyphen[2] };
    }

    // ">= 1.0" becomes ">=1.0"
    const normalized = trimmed.replace(/(===|==|~=|<=|>=|!=|\^|~>?|<|>|=)\s+/g, '$1');
    const bounds = { ...UNBOUNDED };
    for (const token of normalized.split(/[\s,]+/).filter(Boolean)) {
        applyComparator(token, bounds);
    }
    return bounds;
}
