/**
 * Discovery Module
 *
 * Finds gaming content creators on YouTube and Twitch and turns each one into
 * an enriched InfluencerRecord.
 *
 * Responsibilities:
 * - YouTube: keyword video search -> channel details (cached) -> follower
 *   filter -> recent video statistics -> gaming classifier -> enrichment
 * - Twitch: app token -> game ids -> recent archive videos per game ->
 *   user details and follower totals -> follower filter -> recent VODs -> enrichment
 * - Validate every assembled record at the normalizer boundary
 * - Summarize a run and select a balanced priority list
 *
 * Requests run one at a time with a fixed pause between them. There is no retry:
 * a failed request means "no data" and the item is skipped. Missing or rejected
 * credentials abort that platform's pass with DiscoveryAuthError.
 */

import { join } from 'path';
import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import discoveryData from '../data/discovery.json';
import { isGamingChannel } from '../classifier/index.js';
import { enrichCreator } from '../enrichment/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logger/index.js';
import { normalizeCreatorRecord, type RawCreatorRecord } from '../normalizer/index.js';
import { renderInfluencerCsv } from '../renderers/index.js';
import { FsFileStore, type FileStore } from '../storage/index.js';
import type {
  DiscoverySettings,
  InfluencerRecord,
  Platform,
  ResponseLikelihood,
  SentimentCategory,
} from '../types/index.js';

const defaultLogger = createLogger('discovery');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const YOUTUBE_API_URL = 'https://www.googleapis.com/youtube/v3';
const YOUTUBE_GAMING_CATEGORY = '20';
const YOUTUBE_SEARCH_PAGE_SIZE = 50;
const YOUTUBE_RECENT_VIDEOS = 5;

const TWITCH_TOKEN_URL = 'https://id.twitch.tv/oauth2/token';
const TWITCH_API_URL = 'https://api.twitch.tv/helix';
const TWITCH_GAME_VIDEOS_PAGE_SIZE = 100;
const TWITCH_RECENT_VIDEOS = 10;

const DEFAULT_TIMEOUT_MS = 30000;

/** YouTube error reasons that mean the key itself is unusable */
const YOUTUBE_AUTH_REASONS: ReadonlySet<string> = new Set([
  'keyInvalid',
  'keyExpired',
  'accessNotConfigured',
  'forbidden',
]);

export const YOUTUBE_SEARCH_KEYWORDS: readonly string[] = discoveryData.youtubeSearchKeywords;
export const TWITCH_PLATFORMER_GAMES: readonly string[] = discoveryData.twitchGames;

// ============================================================================
// Errors
// ============================================================================

/**
 * Platform credentials are missing or were rejected.
 * Fatal for that platform's pass; other platforms still run.
 */
export class DiscoveryAuthError extends Error {
  constructor(
    readonly platform: Platform,
    message: string
  ) {
    super(message);
    this.name = 'DiscoveryAuthError';
  }
}

// ============================================================================
// Channel Cache
// ============================================================================

/**
 * Memoized channel lookups for one discovery run, keyed by channel id.
 * Channel data is treated as immutable within a run, so entries never expire.
 */
export class ChannelCache<T> {
  private entries = new Map<string, T>();

  get(channelId: string): T | undefined {
    return this.entries.get(channelId);
  }

  set(channelId: string, value: T): void {
    this.entries.set(channelId, value);
  }

  has(channelId: string): boolean {
    return this.entries.has(channelId);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// Shared Collector Plumbing
// ============================================================================

export interface CollectorOptions {
  http?: AxiosInstance;
  logger?: Logger;
  metrics?: Metrics;
  /** Clock for date windows */
  now?: () => Date;
}

/**
 * Outcome of one platform pass
 */
export interface CollectorResult {
  platform: Platform;
  records: InfluencerRecord[];
  /** Unique channels or users examined */
  candidates: number;
  /** Dropped by the follower range or the gaming classifier */
  filtered: number;
  /** Dropped because a request failed or the record did not validate */
  skipped: number;
}

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status === undefined ? { message: error.message } : { message: error.message, status };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

const GoogleErrorBodySchema = z.object({
  error: z.object({
    errors: z.array(z.object({ reason: z.string() })).optional(),
  }),
});

/**
 * First `error.errors[].reason` of a Google API error response, when present
 */
function googleErrorReason(error: unknown): string | undefined {
  if (!axios.isAxiosError(error)) {
    return undefined;
  }
  const parsed = GoogleErrorBodySchema.safeParse(error.response?.data);
  return parsed.success ? parsed.data.error.errors?.[0]?.reason : undefined;
}

function toCount(value: string | number | null | undefined): number {
  const parsed = Number(value ?? 0);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.trunc(parsed) : 0;
}

abstract class PacedCollector {
  protected readonly http: AxiosInstance;
  protected readonly logger: Logger;
  protected readonly metrics: Metrics;
  protected readonly now: () => Date;

  constructor(
    protected readonly settings: DiscoverySettings,
    options: CollectorOptions
  ) {
    this.http = options.http ?? axios.create({ timeout: DEFAULT_TIMEOUT_MS });
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.now = options.now ?? (() => new Date());
  }

  abstract readonly platform: Platform;

  abstract collect(): Promise<CollectorResult>;

  /**
   * GET with the configured pause afterwards, whether or not it succeeded
   */
  protected async get<T>(url: string, config: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.http.get<T>(url, config);
      return response.data;
    } finally {
      await sleep(this.settings.requestDelayMs);
    }
  }

  protected inFollowerRange(followers: number): boolean {
    return followers >= this.settings.minFollowers && followers <= this.settings.maxFollowers;
  }

  protected requestFailed(context: string, error: unknown, details: Record<string, unknown> = {}): void {
    const { message, status } = describeError(error);
    this.logger.warn(`${context} failed`, { ...details, error: message, status });
    this.metrics.increment('discovery.request_failed', { platform: this.platform });
  }

  /**
   * Validate and enrich an assembled record. Invalid records are skipped with a logged reason.
   */
  protected buildRecord(raw: RawCreatorRecord): InfluencerRecord | null {
    const result = normalizeCreatorRecord(raw);
    if (!result.success || !result.data) {
      this.logger.warn('Creator record rejected', {
        platform: this.platform,
        id: raw.id,
        errors: result.error?.details,
      });
      return null;
    }
    return enrichCreator(result.data);
  }
}

// ============================================================================
// YouTube Data API
// ============================================================================

interface YouTubeSearchResponse {
  items?: Array<{
    id?: { videoId?: string };
    snippet?: {
      channelId?: string;
      channelTitle?: string;
      title?: string;
      publishedAt?: string;
    };
  }>;
}

interface YouTubeChannelsResponse {
  items?: Array<{
    id: string;
    snippet?: {
      title?: string;
      customUrl?: string;
      description?: string;
      country?: string;
    };
    statistics?: {
      subscriberCount?: string;
      viewCount?: string;
      videoCount?: string;
    };
  }>;
}

interface YouTubeVideosResponse {
  items?: Array<{
    id: string;
    snippet?: { title?: string; publishedAt?: string };
    statistics?: { viewCount?: string; likeCount?: string };
  }>;
}

/**
 * One search hit; the first hit per channel is its "last video"
 */
export interface YouTubeVideoHit {
  channelId: string;
  channelTitle: string;
  videoId: string;
  videoTitle: string;
  publishedAt: string;
}

export interface YouTubeChannel {
  id: string;
  title: string;
  customUrl: string | null;
  description: string;
  subscriberCount: number;
  viewCount: number;
  videoCount: number;
  country: string | null;
}

export interface YouTubeVideo {
  id: string;
  title: string;
  publishedAt: string;
  viewCount: number;
  likeCount: number;
}

export interface YouTubeCollectorOptions extends CollectorOptions {
  cache?: ChannelCache<YouTubeChannel>;
  keywords?: readonly string[];
}

export class YouTubeCollector extends PacedCollector {
  readonly platform = 'YouTube' as const;
  private readonly cache: ChannelCache<YouTubeChannel>;
  private readonly keywords: readonly string[];

  constructor(settings: DiscoverySettings, options: YouTubeCollectorOptions = {}) {
    super(settings, options);
    this.cache = options.cache ?? new ChannelCache<YouTubeChannel>();
    this.keywords = options.keywords ?? YOUTUBE_SEARCH_KEYWORDS;
  }

  private apiKey(): string {
    if (!this.settings.youtubeApiKey) {
      throw new DiscoveryAuthError('YouTube', 'YOUTUBE_API_KEY is not configured');
    }
    return this.settings.youtubeApiKey;
  }

  /**
   * Search recent gaming-category videos for every keyword.
   * Duplicate video ids are dropped; HTTP 403 (quota) ends the search early.
   *
   * @throws DiscoveryAuthError when the key is missing or rejected
   *   (401, or a keyInvalid / accessNotConfigured / forbidden reason)
   * @throws Error when no search request succeeded
   */
  async searchVideos(): Promise<YouTubeVideoHit[]> {
    const key = this.apiKey();
    const publishedAfter = new Date(this.now().getTime() - this.settings.daysSinceLastVideo * MS_PER_DAY).toISOString();
    const seenVideoIds = new Set<string>();
    const hits: YouTubeVideoHit[] = [];
    let searched = 0;

    for (const keyword of this.keywords) {
      let response: YouTubeSearchResponse;
      try {
        response = await this.get<YouTubeSearchResponse>(`${YOUTUBE_API_URL}/search`, {
          params: {
            part: 'snippet',
            q: keyword,
            type: 'video',
            videoCategoryId: YOUTUBE_GAMING_CATEGORY,
            publishedAfter,
            maxResults: YOUTUBE_SEARCH_PAGE_SIZE,
            key,
          },
        });
      } catch (error) {
        const { status } = describeError(error);
        const reason = googleErrorReason(error);
        if (status === 401 || (reason !== undefined && YOUTUBE_AUTH_REASONS.has(reason))) {
          throw new DiscoveryAuthError('YouTube', `YouTube API key was rejected (${reason ?? status})`);
        }
        if (status === 403) {
          this.logger.warn('YouTube API quota exceeded, stopping search', { keyword, reason });
          break;
        }
        this.requestFailed('YouTube search', error, { keyword });
        continue;
      }
      searched++;

      for (const item of response.items ?? []) {
        const videoId = item.id?.videoId;
        const channelId = item.snippet?.channelId;
        if (!videoId || !channelId || seenVideoIds.has(videoId)) {
          continue;
        }
        seenVideoIds.add(videoId);
        hits.push({
          channelId,
          channelTitle: item.snippet?.channelTitle ?? '',
          videoId,
          videoTitle: item.snippet?.title ?? '',
          publishedAt: item.snippet?.publishedAt ?? '',
        });
      }
    }

    if (searched === 0 && this.keywords.length > 0) {
      throw new Error('Every YouTube search request failed');
    }

    this.logger.info('YouTube search complete', { videos: hits.length });
    this.metrics.gauge('discovery.search_results', hits.length, { platform: 'YouTube' });
    return hits;
  }

  /**
   * Channel snippet and statistics, served from the cache when already fetched
   */
  async getChannel(channelId: string): Promise<YouTubeChannel | null> {
    const cached = this.cache.get(channelId);
    if (cached) {
      return cached;
    }

    try {
      const response = await this.get<YouTubeChannelsResponse>(`${YOUTUBE_API_URL}/channels`, {
        params: { part: 'statistics,snippet', id: channelId, key: this.apiKey() },
      });

      const item = response.items?.[0];
      if (!item) {
        return null;
      }

      const channel: YouTubeChannel = {
        id: channelId,
        title: item.snippet?.title ?? '',
        customUrl: item.snippet?.customUrl || null,
        description: item.snippet?.description ?? '',
        subscriberCount: toCount(item.statistics?.subscriberCount),
        viewCount: toCount(item.statistics?.viewCount),
        videoCount: toCount(item.statistics?.videoCount),
        country: item.snippet?.country || null,
      };
      this.cache.set(channelId, channel);
      return channel;
    } catch (error) {
      this.requestFailed('YouTube channel lookup', error, { channelId });
      return null;
    }
  }

  /**
   * Newest uploads of a channel with view and like statistics
   */
  async getRecentVideos(channelId: string, maxResults = YOUTUBE_RECENT_VIDEOS): Promise<YouTubeVideo[]> {
    try {
      const search = await this.get<YouTubeSearchResponse>(`${YOUTUBE_API_URL}/search`, {
        params: {
          part: 'snippet',
          channelId,
          order: 'date',
          type: 'video',
          maxResults,
          key: this.apiKey(),
        },
      });

      const videoIds = (search.items ?? [])
        .map((item) => item.id?.videoId)
        .filter((id): id is string => Boolean(id));

      if (videoIds.length === 0) {
        return [];
      }

      const stats = await this.get<YouTubeVideosResponse>(`${YOUTUBE_API_URL}/videos`, {
        params: { part: 'statistics,snippet', id: videoIds.join(','), key: this.apiKey() },
      });

      return (stats.items ?? []).map((video) => ({
        id: video.id,
        title: video.snippet?.title ?? '',
        publishedAt: video.snippet?.publishedAt ?? '',
        viewCount: toCount(video.statistics?.viewCount),
        likeCount: toCount(video.statistics?.likeCount),
      }));
    } catch (error) {
      this.requestFailed('YouTube recent videos', error, { channelId });
      return [];
    }
  }

  async collect(): Promise<CollectorResult> {
    const hits = await this.searchVideos();

    const firstHitByChannel = new Map<string, YouTubeVideoHit>();
    for (const hit of hits) {
      if (!firstHitByChannel.has(hit.channelId)) {
        firstHitByChannel.set(hit.channelId, hit);
      }
    }

    const result: CollectorResult = {
      platform: 'YouTube',
      records: [],
      candidates: firstHitByChannel.size,
      filtered: 0,
      skipped: 0,
    };

    this.logger.info('Processing YouTube channels', { channels: firstHitByChannel.size });

    for (const [channelId, hit] of firstHitByChannel) {
      const channel = await this.getChannel(channelId);
      if (!channel) {
        result.skipped++;
        continue;
      }

      // Range check before the more expensive recent-video lookups
      if (!this.inFollowerRange(channel.subscriberCount)) {
        result.filtered++;
        continue;
      }

      const videos = await this.getRecentVideos(channelId);
      if (!isGamingChannel(channel.description, videos.map((video) => video.title))) {
        this.logger.debug('Channel rejected by gaming classifier', { channelId });
        result.filtered++;
        continue;
      }

      const record = this.buildRecord({
        platform: 'YouTube',
        id: channel.id,
        username: channel.title,
        display_name: channel.title,
        url: `https://youtube.com/channel/${channel.id}`,
        custom_url: channel.customUrl,
        description: channel.description,
        followers: channel.subscriberCount,
        total_views: channel.viewCount,
        video_count: channel.videoCount,
        country: channel.country,
        broadcaster_type: null,
        last_video: {
          title: hit.videoTitle,
          published_at: hit.publishedAt,
          url: `https://youtube.com/watch?v=${hit.videoId}`,
        },
        last_game_played: null,
        recent_content: videos
          .filter((video) => video.publishedAt)
          .map((video) => ({
            title: video.title,
            published_at: video.publishedAt,
            view_count: video.viewCount,
            like_count: video.likeCount,
          })),
      });

      if (!record) {
        result.skipped++;
        continue;
      }

      result.records.push(record);
      this.metrics.increment('discovery.record_added', { platform: 'YouTube' });
    }

    return result;
  }
}

// ============================================================================
// Twitch Helix API
// ============================================================================

interface TwitchTokenResponse {
  access_token?: string;
}

interface TwitchGamesResponse {
  data?: Array<{ id: string; name: string }>;
}

interface TwitchVideo {
  id: string;
  user_id: string;
  user_name: string;
  title: string;
  url: string;
  created_at: string;
  view_count: number;
}

interface TwitchVideosResponse {
  data?: TwitchVideo[];
}

interface TwitchUsersResponse {
  data?: Array<{
    id: string;
    login: string;
    display_name: string;
    description?: string;
    view_count?: number;
    broadcaster_type?: string;
  }>;
}

interface TwitchFollowersResponse {
  total?: number;
}

/**
 * A recent archive video of a searched game; the first per user is their "last video"
 */
export interface TwitchStreamHit {
  userId: string;
  userName: string;
  videoTitle: string;
  videoUrl: string;
  createdAt: string;
  gameName: string;
}

export interface TwitchUser {
  id: string;
  login: string;
  displayName: string;
  description: string;
  viewCount: number;
  broadcasterType: string | null;
  followers: number;
}

export interface TwitchCollectorOptions extends CollectorOptions {
  games?: readonly string[];
}

export class TwitchCollector extends PacedCollector {
  readonly platform = 'Twitch' as const;
  private readonly games: readonly string[];
  private accessToken: string | null = null;

  constructor(settings: DiscoverySettings, options: TwitchCollectorOptions = {}) {
    super(settings, options);
    this.games = options.games ?? TWITCH_PLATFORMER_GAMES;
  }

  private clientId(): string {
    if (!this.settings.twitchClientId) {
      throw new DiscoveryAuthError('Twitch', 'TWITCH_CLIENT_ID is not configured');
    }
    return this.settings.twitchClientId;
  }

  /**
   * Obtain an app access token through the client-credentials grant
   */
  async authenticate(): Promise<string> {
    const clientId = this.clientId();
    const clientSecret = this.settings.twitchClientSecret;
    if (!clientSecret) {
      throw new DiscoveryAuthError('Twitch', 'TWITCH_CLIENT_SECRET is not configured');
    }

    let token: string | undefined;
    try {
      const response = await this.http.post<TwitchTokenResponse>(TWITCH_TOKEN_URL, null, {
        params: { client_id: clientId, client_secret: clientSecret, grant_type: 'client_credentials' },
      });
      token = response.data.access_token;
    } catch (error) {
      throw new DiscoveryAuthError('Twitch', `Twitch authentication failed: ${describeError(error).message}`);
    } finally {
      await sleep(this.settings.requestDelayMs);
    }

    if (!token) {
      throw new DiscoveryAuthError('Twitch', 'Twitch authentication returned no access token');
    }

    this.accessToken = token;
    return token;
  }

  private helix<T>(path: string, params: Record<string, string | number>): Promise<T> {
    return this.get<T>(`${TWITCH_API_URL}${path}`, {
      params,
      headers: {
        'Client-ID': this.clientId(),
        Authorization: `Bearer ${this.accessToken ?? ''}`,
      },
    });
  }

  async findGameId(gameName: string): Promise<string | null> {
    try {
      const response = await this.helix<TwitchGamesResponse>('/games', { name: gameName });
      return response.data?.[0]?.id ?? null;
    } catch (error) {
      this.requestFailed('Twitch game lookup', error, { gameName });
      return null;
    }
  }

  /**
   * Archive videos of a game created within the configured number of days
   */
  async findStreamsForGame(gameId: string, gameName: string): Promise<TwitchStreamHit[]> {
    try {
      const response = await this.helix<TwitchVideosResponse>('/videos', {
        game_id: gameId,
        first: TWITCH_GAME_VIDEOS_PAGE_SIZE,
        type: 'archive',
        sort: 'time',
        period: 'month',
      });

      const now = this.now().getTime();
      return (response.data ?? [])
        .filter((video) => {
          const created = Date.parse(video.created_at);
          return !Number.isNaN(created) && Math.floor((now - created) / MS_PER_DAY) <= this.settings.daysSinceLastVideo;
        })
        .map((video) => ({
          userId: video.user_id,
          userName: video.user_name,
          videoTitle: video.title,
          videoUrl: video.url,
          createdAt: video.created_at,
          gameName,
        }));
    } catch (error) {
      this.requestFailed('Twitch game videos', error, { gameId, gameName });
      return [];
    }
  }

  /**
   * User profile plus follower total. A failed follower lookup counts as 0 followers.
   */
  async getUser(userId: string): Promise<TwitchUser | null> {
    let user: NonNullable<TwitchUsersResponse['data']>[number] | undefined;
    try {
      const response = await this.helix<TwitchUsersResponse>('/users', { id: userId });
      user = response.data?.[0];
    } catch (error) {
      this.requestFailed('Twitch user lookup', error, { userId });
      return null;
    }

    if (!user) {
      return null;
    }

    let followers = 0;
    try {
      const response = await this.helix<TwitchFollowersResponse>('/channels/followers', { broadcaster_id: userId });
      followers = toCount(response.total);
    } catch (error) {
      this.requestFailed('Twitch follower lookup', error, { userId });
    }

    return {
      id: user.id,
      login: user.login,
      displayName: user.display_name,
      description: user.description ?? '',
      viewCount: toCount(user.view_count),
      broadcasterType: user.broadcaster_type || null,
      followers,
    };
  }

  async getRecentVods(userId: string, maxResults = TWITCH_RECENT_VIDEOS): Promise<TwitchVideo[]> {
    try {
      const response = await this.helix<TwitchVideosResponse>('/videos', {
        user_id: userId,
        first: maxResults,
        type: 'archive',
      });
      return response.data ?? [];
    } catch (error) {
      this.requestFailed('Twitch VOD lookup', error, { userId });
      return [];
    }
  }

  async collect(): Promise<CollectorResult> {
    await this.authenticate();

    const hits: TwitchStreamHit[] = [];
    for (const gameName of this.games) {
      const gameId = await this.findGameId(gameName);
      if (!gameId) {
        this.logger.warn('Game not found on Twitch', { gameName });
        continue;
      }
      const streams = await this.findStreamsForGame(gameId, gameName);
      this.logger.info('Twitch game searched', { gameName, videos: streams.length });
      hits.push(...streams);
    }

    const firstHitByUser = new Map<string, TwitchStreamHit>();
    for (const hit of hits) {
      if (!firstHitByUser.has(hit.userId)) {
        firstHitByUser.set(hit.userId, hit);
      }
    }

    this.metrics.gauge('discovery.search_results', hits.length, { platform: 'Twitch' });
    this.logger.info('Processing Twitch streamers', { streamers: firstHitByUser.size });

    const result: CollectorResult = {
      platform: 'Twitch',
      records: [],
      candidates: firstHitByUser.size,
      filtered: 0,
      skipped: 0,
    };

    for (const [userId, hit] of firstHitByUser) {
      const user = await this.getUser(userId);
      if (!user) {
        result.skipped++;
        continue;
      }

      if (!this.inFollowerRange(user.followers)) {
        result.filtered++;
        continue;
      }

      const vods = await this.getRecentVods(userId);

      const record = this.buildRecord({
        platform: 'Twitch',
        id: user.id,
        username: user.login,
        display_name: user.displayName,
        url: `https://twitch.tv/${user.login}`,
        custom_url: null,
        description: user.description,
        followers: user.followers,
        total_views: user.viewCount,
        video_count: vods.length,
        country: null,
        broadcaster_type: user.broadcasterType,
        last_video: {
          title: hit.videoTitle,
          published_at: hit.createdAt,
          url: hit.videoUrl,
        },
        last_game_played: hit.gameName,
        recent_content: vods.map((vod) => ({
          title: vod.title,
          published_at: vod.created_at,
          view_count: vod.view_count,
        })),
      });

      if (!record) {
        result.skipped++;
        continue;
      }

      result.records.push(record);
      this.metrics.increment('discovery.record_added', { platform: 'Twitch' });
    }

    return result;
  }
}

// ============================================================================
// Run Orchestration
// ============================================================================

export interface PlatformError {
  platform: Platform;
  code: 'AUTH_FAILED' | 'DISCOVERY_FAILED';
  message: string;
}

export interface DiscoverySummary {
  total: number;
  by_platform: Record<Platform, number>;
  with_email: number;
  with_twitter: number;
  with_instagram: number;
  with_discord: number;
  /** Mean upload frequency over creators with a known cadence; null when none */
  avg_upload_frequency_days: number | null;
  /** Posting at least every 3 days */
  very_active: number;
  consistent_uploaders: number;
  sentiment: Record<SentimentCategory, number>;
  response_likelihood: Record<ResponseLikelihood, number>;
}

export interface DiscoveryRun {
  records: InfluencerRecord[];
  platforms: CollectorResult[];
  platform_errors: PlatformError[];
  summary: DiscoverySummary;
}

export interface DiscoveryCollector {
  readonly platform: Platform;
  collect(): Promise<CollectorResult>;
}

export interface RunDiscoveryOptions extends CollectorOptions {
  /** Replace the default collectors (YouTube then Twitch) */
  collectors?: DiscoveryCollector[];
}

export function summarizeDiscovery(records: readonly InfluencerRecord[]): DiscoverySummary {
  const active = records.filter((record) => record.upload_frequency_days > 0);
  const count = (predicate: (record: InfluencerRecord) => boolean) => records.filter(predicate).length;

  return {
    total: records.length,
    by_platform: {
      YouTube: count((record) => record.platform === 'YouTube'),
      Twitch: count((record) => record.platform === 'Twitch'),
    },
    with_email: count((record) => record.email_count > 0),
    with_twitter: count((record) => Boolean(record.social_links.twitter)),
    with_instagram: count((record) => Boolean(record.social_links.instagram)),
    with_discord: count((record) => Boolean(record.social_links.discord)),
    avg_upload_frequency_days:
      active.length > 0
        ? Math.round((active.reduce((sum, record) => sum + record.upload_frequency_days, 0) / active.length) * 10) / 10
        : null,
    very_active: active.filter((record) => record.upload_frequency_days <= 3).length,
    consistent_uploaders: count(
      (record) => record.upload_consistency === 'very_consistent' || record.upload_consistency === 'consistent'
    ),
    sentiment: {
      very_positive: count((record) => record.indie_sentiment === 'very_positive'),
      positive: count((record) => record.indie_sentiment === 'positive'),
      neutral: count((record) => record.indie_sentiment === 'neutral'),
      negative: count((record) => record.indie_sentiment === 'negative'),
      very_negative: count((record) => record.indie_sentiment === 'very_negative'),
    },
    response_likelihood: {
      'Very High': count((record) => record.response_likelihood === 'Very High'),
      High: count((record) => record.response_likelihood === 'High'),
      Medium: count((record) => record.response_likelihood === 'Medium'),
      Low: count((record) => record.response_likelihood === 'Low'),
      'Very Low': count((record) => record.response_likelihood === 'Very Low'),
    },
  };
}

/**
 * Run every platform pass in turn. An auth failure on one platform is
 * recorded in platform_errors and does not stop the others.
 */
export async function runDiscovery(
  settings: DiscoverySettings,
  options: RunDiscoveryOptions = {}
): Promise<DiscoveryRun> {
  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const collectors = options.collectors ?? [
    new YouTubeCollector(settings, options),
    new TwitchCollector(settings, options),
  ];

  const startTime = Date.now();
  const records: InfluencerRecord[] = [];
  const platforms: CollectorResult[] = [];
  const platformErrors: PlatformError[] = [];

  for (const collector of collectors) {
    logger.info('Starting platform discovery', { platform: collector.platform });
    try {
      const result = await collector.collect();
      platforms.push(result);
      records.push(...result.records);
      metrics.gauge('discovery.records', result.records.length, { platform: collector.platform });
      logger.info('Platform discovery complete', {
        platform: collector.platform,
        records: result.records.length,
        candidates: result.candidates,
        filtered: result.filtered,
        skipped: result.skipped,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof DiscoveryAuthError ? 'AUTH_FAILED' : 'DISCOVERY_FAILED';
      platformErrors.push({ platform: collector.platform, code, message });
      metrics.increment('discovery.platform_failed', { platform: collector.platform, code });
      logger.error('Platform discovery failed', { platform: collector.platform, code, error: message });
    }
  }

  metrics.timing('discovery.duration', Date.now() - startTime);

  return {
    records,
    platforms,
    platform_errors: platformErrors,
    summary: summarizeDiscovery(records),
  };
}

// ============================================================================
// Priority Selection
// ============================================================================

function byResponseScore(records: readonly InfluencerRecord[], platform: Platform): InfluencerRecord[] {
  return records
    .filter((record) => record.platform === platform)
    .sort((a, b) => b.response_score - a.response_score);
}

/**
 * Top records by response score, balanced between platforms.
 * When one platform has fewer than perPlatform records, the other fills the gap.
 * YouTube records come first, each platform's slice in descending score order.
 */
export function selectPriorityList(
  records: readonly InfluencerRecord[],
  perPlatform = 25,
  total = 50
): InfluencerRecord[] {
  const youtube = byResponseScore(records, 'YouTube');
  const twitch = byResponseScore(records, 'Twitch');

  let youtubeTake = Math.min(perPlatform, youtube.length);
  let twitchTake = Math.min(perPlatform, twitch.length);
  let spare = total - youtubeTake - twitchTake;

  if (spare > 0) {
    const extraTwitch = Math.min(spare, twitch.length - twitchTake);
    twitchTake += extraTwitch;
    spare -= extraTwitch;
    youtubeTake += Math.min(spare, youtube.length - youtubeTake);
  }

  return [...youtube.slice(0, youtubeTake), ...twitch.slice(0, twitchTake)];
}

// ============================================================================
// Output Files
// ============================================================================

export const DISCOVERY_OUTPUT_FILES = {
  allCsv: 'influencers_with_contacts.csv',
  backupJson: 'influencers_backup.json',
  priorityCsv: 'influencers_priority_top50.csv',
  priorityJson: 'influencers_priority_top50.json',
} as const;

/**
 * Write the full export, its JSON backup and the balanced priority list
 *
 * @returns Paths written, keyed like DISCOVERY_OUTPUT_FILES
 */
export async function saveDiscoveryResults(
  records: readonly InfluencerRecord[],
  outputDir: string,
  store: FileStore = new FsFileStore(),
  logger: Logger = defaultLogger
): Promise<Record<keyof typeof DISCOVERY_OUTPUT_FILES, string>> {
  const paths = {
    allCsv: join(outputDir, DISCOVERY_OUTPUT_FILES.allCsv),
    backupJson: join(outputDir, DISCOVERY_OUTPUT_FILES.backupJson),
    priorityCsv: join(outputDir, DISCOVERY_OUTPUT_FILES.priorityCsv),
    priorityJson: join(outputDir, DISCOVERY_OUTPUT_FILES.priorityJson),
  };
  const priority = selectPriorityList(records);

  await store.writeText(paths.allCsv, renderInfluencerCsv(records));
  await store.writeText(paths.backupJson, `${JSON.stringify(records, null, 2)}\n`);
  await store.writeText(paths.priorityCsv, renderInfluencerCsv(priority));
  await store.writeText(paths.priorityJson, `${JSON.stringify(priority, null, 2)}\n`);

  logger.info('Discovery results saved', { records: records.length, priority: priority.length, outputDir });
  return paths;
}
