import type { DepthName, DepthProfile, FocusEntity, ProfileContext } from '../types/collectors';
import type { DepthFile, DomainFile, ProfileFile, ScoringFile } from './yaml-types';

interface RankedEntity extends FocusEntity {
  priority: number;
}

/**
 * Domain entities seen through the profile's focus: excluded ones dropped,
 * priorities mapped to relevance weights, highest priority first.
 */
export function resolveFocusEntities(
  domain: DomainFile,
  profile: ProfileFile,
  weights: ScoringFile['entity_weights']
): FocusEntity[] {
  const ranked: RankedEntity[] = [];

  for (const [type, entities] of Object.entries(domain.entity_types)) {
    const focus = profile.focus[type];

    for (const entity of entities) {
      const keys = [entity.name, entity.symbol].filter((key): key is string => Boolean(key));
      const matches = (list: readonly string[]) => keys.some((key) => list.includes(key));

      if (focus && matches(focus.exclude)) continue;

      let priority = 3;
      if (focus && matches(focus.priority_1)) priority = 1;
      else if (focus && matches(focus.priority_2)) priority = 2;

      const explicit = focus ? keys.map((key) => focus.weights[key]).find((w) => w !== undefined) : undefined;
      const weight =
        explicit ?? (priority === 1 ? weights.priority_1 : priority === 2 ? weights.priority_2 : weights.default);

      ranked.push({
        name: entity.name,
        type,
        aliases: entity.aliases,
        weight,
        symbol: entity.symbol,
        priority
      });
    }
  }

  // stable: ties keep domain order
  return ranked
    .map((entity, index) => ({ entity, index }))
    .sort((a, b) => a.entity.priority - b.entity.priority || a.index - b.index)
    .map(({ entity: { priority: _priority, ...rest } }) => rest);
}

export function buildProfileContext(domain: DomainFile, profile: ProfileFile, scoring: ScoringFile): ProfileContext {
  const selected = new Set(profile.publications);
  const publications = domain.publications
    .filter((pub) => selected.size === 0 || selected.has(pub.name))
    .map((pub) => ({ name: pub.name, url: pub.url, feedUrl: pub.rss }));

  return {
    domain: domain.domain,
    profile: profile.profile_name,
    boostKeywords: profile.keywords.boost,
    filterKeywords: profile.keywords.filter,
    entities: resolveFocusEntities(domain, profile, scoring.entity_weights),
    thoughtLeaders: profile.thought_leaders.flatMap((leader) =>
      leader.x_handle ? [{ name: leader.name, handle: leader.x_handle, priority: leader.priority }] : []
    ),
    publications,
    scrapeTargets: domain.scrape_targets.map((target) => ({
      name: target.name,
      url: target.url,
      selector: target.selector,
      titleSelector: target.title_selector,
      linkSelector: target.link_selector,
      snippetSelector: target.snippet_selector,
      dateSelector: target.date_selector
    })),
    requireTimestamp: profile.require_timestamp
  };
}

/**
 * Report types the profile turned on, falling back to the domain's first report
 */
export function enabledReports(domain: DomainFile, profile: ProfileFile): string[] {
  const enabled = Object.entries(profile.reports)
    .filter(([, on]) => on)
    .map(([type]) => type);
  if (enabled.length > 0) return enabled;
  return domain.reports.slice(0, 1).map((report) => report.type);
}

export function resolveDepthProfile(file: DepthFile, name: DepthName): DepthProfile {
  const entry = file.profiles[name];
  return {
    name,
    maxItems: entry.max_items,
    timeoutMs: entry.timeout_ms,
    targetItems: entry.target_items
  };
}
