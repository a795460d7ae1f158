export interface UserProfile {
  userId: string;
  displayName?: string;
  preferences: Record<string, unknown>;
  metadata: Record<string, unknown>;
  createdAt: number;
  updatedAt: number;
}

export interface InteractionRecord {
  id: string;
  userId: string;
  sessionId: string;
  message: string;
  intent?: string;
  timestamp: number;
  context: Record<string, unknown>;
}

export type NewInteraction = Omit<InteractionRecord, 'id' | 'timestamp'> & { timestamp?: number };

export interface InteractionQuery {
  sessionId?: string;
  /** Epoch millis; only interactions at or after this instant */
  since?: number;
  limit: number;
}

export interface ProfileStore {
  getProfile(userId: string): Promise<UserProfile | null>;
  saveProfile(profile: UserProfile): Promise<void>;
  /** Merge preferences into the stored profile, creating it when absent */
  updatePreferences(userId: string, preferences: Record<string, unknown>): Promise<boolean>;
}

export interface InteractionLogStore {
  /** Newest first */
  queryRecent(userId: string, query: InteractionQuery): Promise<InteractionRecord[]>;
  append(interaction: NewInteraction): Promise<InteractionRecord>;
}

export interface PersonalizationRequest {
  userId: string;
  sessionId: string;
  /** Outgoing text to adapt */
  message: string;
  /** What the user said this turn; recorded in the interaction log */
  userMessage: string;
  intent?: string;
  context?: Record<string, unknown>;
}

export interface PersonalizationResult {
  text: string;
  /** False when a store failure forced the unmodified message */
  degraded: boolean;
  preferences: Record<string, unknown>;
}
