/**
 * Robots.txt Parser
 * Group selection, Allow/Disallow matching and Crawl-delay extraction
 */

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  userAgents: string[];
  rules: RobotsRule[];
  crawlDelaySeconds: number | null;
}

export interface RobotsRules {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export interface ResolvedRobotsPolicy {
  rules: RobotsRule[];
  crawlDelaySeconds: number | null;
}

/**
 * Parse robots.txt content into user-agent groups.
 * Consecutive User-agent lines share one group; a rule line closes the agent list.
 */
export function parseRobotsTxt(body: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | null = null;
  let collectingAgents = false;

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const field = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    switch (field) {
      case 'user-agent': {
        if (!current || !collectingAgents) {
          current = { userAgents: [], rules: [], crawlDelaySeconds: null };
          groups.push(current);
        }
        current.userAgents.push(value.toLowerCase());
        collectingAgents = true;
        break;
      }
      case 'allow':
      case 'disallow': {
        collectingAgents = false;
        if (!current) break;
        // An empty Disallow allows everything; it adds no rule
        if (value.length === 0) break;
        current.rules.push({ allow: field === 'allow', pattern: value });
        break;
      }
      case 'crawl-delay': {
        collectingAgents = false;
        if (!current) break;
        const seconds = Number.parseFloat(value);
        if (Number.isFinite(seconds) && seconds >= 0) {
          current.crawlDelaySeconds = seconds;
        }
        break;
      }
      case 'sitemap': {
        if (value) sitemaps.push(value);
        break;
      }
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

/**
 * Product token of a user-agent string: "SiteAuditBot/1.0 (+url)" -> "siteauditbot"
 */
export function productToken(userAgent: string): string {
  const first = userAgent.trim().split(/[\s/]/)[0] ?? '';
  return first.toLowerCase();
}

/**
 * Pick the group that applies to the given user agent.
 * The longest agent token contained in our product token wins; `*` is the fallback.
 * Groups naming the same agent are merged.
 */
export function resolvePolicy(robots: RobotsRules, userAgent: string): ResolvedRobotsPolicy {
  const token = productToken(userAgent);
  let bestLength = 0;
  let matched: RobotsGroup[] = [];

  for (const group of robots.groups) {
    for (const agent of group.userAgents) {
      if (agent === '*' || agent.length === 0 || !token.includes(agent)) continue;
      if (agent.length > bestLength) {
        bestLength = agent.length;
        matched = [group];
      } else if (agent.length === bestLength && !matched.includes(group)) {
        matched.push(group);
      }
    }
  }

  if (matched.length === 0) {
    matched = robots.groups.filter((group) => group.userAgents.includes('*'));
  }

  const rules = matched.flatMap((group) => group.rules);
  const delays = matched
    .map((group) => group.crawlDelaySeconds)
    .filter((delay): delay is number => delay !== null);

  return {
    rules,
    crawlDelaySeconds: delays.length > 0 ? Math.max(...delays) : null,
  };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Longest-match rule evaluation; Allow wins a tie. No matching rule means allowed.
 */
export function isPathAllowed(policy: ResolvedRobotsPolicy, pathWithQuery: string): boolean {
  if (pathWithQuery === '/robots.txt') {
    return true;
  }

  const target = safeDecode(pathWithQuery);
  let bestLength = -1;
  let allowed = true;

  for (const rule of policy.rules) {
    const pattern = safeDecode(rule.pattern);
    if (!patternToRegExp(pattern).test(target)) continue;

    const length = pattern.length;
    if (length > bestLength || (length === bestLength && rule.allow && !allowed)) {
      bestLength = length;
      allowed = rule.allow;
    }
  }

  return allowed;
}
