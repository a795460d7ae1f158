import { InteractionRecord, UserProfile } from './types';

const FOLLOW_UP_PREFIX = 'To follow up on our previous conversation, ';
const GREETING_PATTERN = /^(hi|hello|hey)\b/i;

function lowerFirst(text: string): string {
  return text.length > 0 ? text[0].toLowerCase() + text.slice(1) : text;
}

/** Greeting for an hour of the day (0-23) */
export function timeOfDayGreeting(hour: number): string {
  if (hour >= 5 && hour < 12) return 'Good morning!';
  if (hour >= 12 && hour < 17) return 'Good afternoon!';
  if (hour >= 17 && hour < 22) return 'Good evening!';
  return 'Hello!';
}

export function displayNameOf(profile: UserProfile): string | undefined {
  if (profile.displayName) return profile.displayName;
  const name = profile.preferences.name;
  return typeof name === 'string' && name.trim() ? name.trim() : undefined;
}

/**
 * Pure text adaptation from stored profile data.
 *
 * `recentInteractions` is chronological; the last entry is the most recent
 * prior interaction. The time-of-day greeting uses the UTC hour of `now`.
 */
export class ResponsePersonalizer {
  personalize(
    message: string,
    profile: UserProfile | null,
    recentInteractions: InteractionRecord[],
    intent?: string,
    now: Date = new Date(),
  ): string {
    if (!message || !profile) return message;

    let personalized = message;

    const name = displayNameOf(profile);
    const named = Boolean(name) && !message.toLowerCase().includes(String(name).toLowerCase());
    if (named) {
      personalized = `${name}, ${lowerFirst(message)}`;
    }

    const previous = recentInteractions[recentInteractions.length - 1];
    if (intent && previous?.intent === intent) {
      // The name keeps its capitalization when it leads the message
      personalized = `${FOLLOW_UP_PREFIX}${named ? personalized : lowerFirst(personalized)}`;
    }

    if (GREETING_PATTERN.test(message.trim())) {
      personalized = `${timeOfDayGreeting(now.getUTCHours())} ${personalized}`;
    }

    return personalized;
  }
}
