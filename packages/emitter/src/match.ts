import {
  MULTI_WILDCARD,
  RESERVED_TOPIC_CHARACTERS,
  SEGMENT_SEPARATOR,
  SINGLE_WILDCARD,
} from "./constants.js";

/**
 * Check whether a topic name matches a subscription pattern.
 *
 * Segments are separated by dots. `*` matches exactly one segment (which may
 * be empty) and `**` matches zero or more segments. Never throws.
 *
 * @example
 * matchTopicPattern("user.*", "user.created"); // true
 * matchTopicPattern("order.**", "order.item.added"); // true
 * matchTopicPattern("event.**", "event"); // false
 */
export function matchTopicPattern(pattern: string, topic: string): boolean {
  if (pattern === topic) {
    return true;
  }

  if (!pattern.includes(SEGMENT_SEPARATOR) && !topic.includes(SEGMENT_SEPARATOR)) {
    return pattern === SINGLE_WILDCARD || pattern === MULTI_WILDCARD;
  }

  if (pattern === SINGLE_WILDCARD && topic === "") {
    return true;
  }

  const patternParts = pattern.split(SEGMENT_SEPARATOR);
  const topicParts = topic.split(SEGMENT_SEPARATOR);

  // "event.**" subscribes to the children of "event", not to "event" itself
  if (
    patternParts.length > 1 &&
    patternParts[patternParts.length - 1] === MULTI_WILDCARD &&
    topicParts.length === 1 &&
    topicParts[0] === patternParts[0]
  ) {
    return false;
  }

  return matchParts(patternParts, 0, topicParts, 0);
}

function matchParts(
  pattern: readonly string[],
  p: number,
  topic: readonly string[],
  t: number,
): boolean {
  if (p === pattern.length && t === topic.length) {
    return true;
  }

  if (t === topic.length) {
    for (let i = p; i < pattern.length; i++) {
      if (pattern[i] !== MULTI_WILDCARD) {
        return false;
      }
    }
    return true;
  }

  if (p === pattern.length) {
    return false;
  }

  const segment = pattern[p];

  if (segment === SINGLE_WILDCARD) {
    return matchParts(pattern, p + 1, topic, t + 1);
  }

  if (segment === MULTI_WILDCARD) {
    if (p === pattern.length - 1) {
      return true;
    }
    for (let skip = 0; skip <= topic.length - t; skip++) {
      if (matchParts(pattern, p + 1, topic, t + skip)) {
        return true;
      }
    }
    return false;
  }

  return segment === topic[t] && matchParts(pattern, p + 1, topic, t + 1);
}

/**
 * A topic name or pattern is valid when it is non-empty and contains none of
 * the reserved glob characters.
 */
export function isValidTopicName(name: string): boolean {
  if (name.length === 0) {
    return false;
  }
  return !RESERVED_TOPIC_CHARACTERS.some((ch) => name.includes(ch));
}
