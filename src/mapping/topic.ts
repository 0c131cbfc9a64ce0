import { ConfigError } from '../errors/bridge-error.js';

export function splitTopic(topic: string): string[] {
  return topic.split('/');
}

/**
 * MQTT subscription matching. `+` takes exactly one level, a trailing `#`
 * takes the rest including none, so `a/#` also matches `a`. Wildcards in the
 * first level never match `$`-prefixed system topics.
 */
export function matchTopic(pattern: string, topic: string): boolean {
  const filter = splitTopic(pattern);
  const levels = splitTopic(topic);

  if (topic.startsWith('$') && (filter[0] === '+' || filter[0] === '#')) {
    return false;
  }

  for (let i = 0; i < filter.length; i++) {
    const segment = filter[i];

    if (segment === '#') {
      return i === filter.length - 1;
    }
    if (i >= levels.length) {
      return false;
    }
    if (segment !== '+' && segment !== levels[i]) {
      return false;
    }
  }

  return filter.length === levels.length;
}

export function validateTopicPattern(pattern: string): void {
  if (pattern.length === 0) {
    throw new ConfigError('topic pattern must not be empty', [pattern]);
  }

  const segments = splitTopic(pattern);
  segments.forEach((segment, index) => {
    if (segment === '#' && index !== segments.length - 1) {
      throw new ConfigError(`'#' must be the last level of topic pattern '${pattern}'`, [pattern]);
    }
    if (segment.length > 1 && (segment.includes('#') || segment.includes('+'))) {
      throw new ConfigError(
        `wildcard must occupy a whole level in topic pattern '${pattern}'`,
        [pattern]
      );
    }
  });
}
