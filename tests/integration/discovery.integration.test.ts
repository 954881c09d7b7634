/**
 * Discovery Module Integration Tests
 *
 * Collectors run against an in-process axios adapter that answers like the
 * YouTube Data API and the Twitch Helix API.
 */

import { describe, it, expect } from '@jest/globals';
import {
  ChannelCache,
  DiscoveryAuthError,
  runDiscovery,
  saveDiscoveryResults,
  selectPriorityList,
  summarizeDiscovery,
  TwitchCollector,
  YouTubeCollector,
  type YouTubeChannel,
} from '../../src/discovery/index.js';
import { silentLogger } from '../../src/logger/index.js';
import { MemoryFileStore } from '../../src/storage/index.js';
import type { DiscoverySettings } from '../../src/types/index.js';
import { createFakeHttp, fail, googleError, ok, type FakeRequest, type FakeReply } from '../helpers/http.js';
import { createTestLogger, createTestMetrics } from '../helpers/observability.js';
import { makeRecord } from '../helpers/records.js';

const NOW = new Date('2024-06-10T00:00:00.000Z');

const settings: DiscoverySettings = {
  youtubeApiKey: 'test-key',
  twitchClientId: 'test-client',
  twitchClientSecret: 'test-secret',
  minFollowers: 1000,
  maxFollowers: 100000,
  daysSinceLastVideo: 30,
  requestDelayMs: 0,
};

const YT = 'https://www.googleapis.com/youtube/v3';
const HELIX = 'https://api.twitch.tv/helix';

// ============================================================================
// YouTube fixtures
// ============================================================================

function youtubeRoute(request: FakeRequest): FakeReply {
  const { url, params } = request;

  if (url === `${YT}/search` && params.q !== undefined) {
    return ok({
      items: [
        {
          id: { videoId: 'v1' },
          snippet: { channelId: 'UC_A', channelTitle: 'Alpha', title: 'Celeste speedrun PB', publishedAt: '2024-06-08T00:00:00Z' },
        },
        {
          id: { videoId: 'v2' },
          snippet: { channelId: 'UC_A', channelTitle: 'Alpha', title: 'Older upload', publishedAt: '2024-06-01T00:00:00Z' },
        },
        {
          id: { videoId: 'v3' },
          snippet: { channelId: 'UC_B', channelTitle: 'Big', title: 'Huge stream', publishedAt: '2024-06-07T00:00:00Z' },
        },
        {
          id: { videoId: 'v4' },
          snippet: { channelId: 'UC_C', channelTitle: 'Cook', title: 'Pasta night', publishedAt: '2024-06-06T00:00:00Z' },
        },
        {
          id: { videoId: 'v1' },
          snippet: { channelId: 'UC_A', channelTitle: 'Alpha', title: 'Celeste speedrun PB', publishedAt: '2024-06-08T00:00:00Z' },
        },
      ],
    });
  }

  if (url === `${YT}/channels`) {
    switch (params.id) {
      case 'UC_A':
        return ok({
          items: [
            {
              id: 'UC_A',
              snippet: {
                title: 'Alpha',
                customUrl: '@alpha',
                description: 'Gameplay and walkthroughs of indie platformers. Business inquiries: alpha@creator.test',
                country: 'US',
              },
              statistics: { subscriberCount: '20000', viewCount: '500000', videoCount: '150' },
            },
          ],
        });
      case 'UC_B':
        return ok({
          items: [{ id: 'UC_B', snippet: { title: 'Big', description: 'Gameplay' }, statistics: { subscriberCount: '250000' } }],
        });
      case 'UC_C':
        return ok({
          items: [
            { id: 'UC_C', snippet: { title: 'Cook', description: 'Cooking recipe vlog' }, statistics: { subscriberCount: '5000' } },
          ],
        });
      default:
        return ok({ items: [] });
    }
  }

  if (url === `${YT}/search` && params.channelId === 'UC_A') {
    return ok({ items: [{ id: { videoId: 'r1' } }, { id: { videoId: 'r2' } }] });
  }

  if (url === `${YT}/search` && params.channelId === 'UC_C') {
    return ok({ items: [{ id: { videoId: 'c1' } }] });
  }

  if (url === `${YT}/videos` && params.id === 'r1,r2') {
    return ok({
      items: [
        {
          id: 'r1',
          snippet: { title: 'Celeste speedrun PB', publishedAt: '2024-06-08T00:00:00Z' },
          statistics: { viewCount: '3000', likeCount: '150' },
        },
        {
          id: 'r2',
          snippet: { title: 'Hollow Knight walkthrough', publishedAt: '2024-06-04T00:00:00Z' },
          statistics: { viewCount: '1000', likeCount: '50' },
        },
      ],
    });
  }

  if (url === `${YT}/videos` && params.id === 'c1') {
    return ok({
      items: [{ id: 'c1', snippet: { title: 'Pasta recipe', publishedAt: '2024-06-06T00:00:00Z' }, statistics: { viewCount: '10' } }],
    });
  }

  return fail(404);
}

// ============================================================================
// Twitch fixtures
// ============================================================================

function twitchRoute(request: FakeRequest): FakeReply {
  const { method, url, params } = request;

  if (method === 'post' && url === 'https://id.twitch.tv/oauth2/token') {
    return ok({ access_token: 'test-token' });
  }

  if (url === `${HELIX}/games`) {
    return params.name === 'Celeste' ? ok({ data: [{ id: '504', name: 'Celeste' }] }) : ok({ data: [] });
  }

  if (url === `${HELIX}/videos` && params.game_id === '504') {
    return ok({
      data: [
        {
          id: 't1',
          user_id: 'u1',
          user_name: 'Jo',
          title: 'Celeste any%',
          url: 'https://www.twitch.tv/videos/t1',
          created_at: '2024-06-09T00:00:00Z',
          view_count: 500,
        },
        {
          id: 't2',
          user_id: 'u1',
          user_name: 'Jo',
          title: 'Celeste practice',
          url: 'https://www.twitch.tv/videos/t2',
          created_at: '2024-06-05T00:00:00Z',
          view_count: 300,
        },
        {
          id: 't3',
          user_id: 'u2',
          user_name: 'Stale',
          title: 'Old run',
          url: 'https://www.twitch.tv/videos/t3',
          created_at: '2024-04-01T00:00:00Z',
          view_count: 50,
        },
        {
          id: 't4',
          user_id: 'u3',
          user_name: 'Tiny',
          title: 'First stream',
          url: 'https://www.twitch.tv/videos/t4',
          created_at: '2024-06-08T00:00:00Z',
          view_count: 5,
        },
      ],
    });
  }

  if (url === `${HELIX}/users`) {
    if (params.id === 'u1') {
      return ok({
        data: [
          {
            id: 'u1',
            login: 'jo_plays',
            display_name: 'Jo',
            description: 'Variety streamer. Discord: discord.gg/joplays',
            view_count: 12000,
            broadcaster_type: 'affiliate',
          },
        ],
      });
    }
    if (params.id === 'u3') {
      return ok({ data: [{ id: 'u3', login: 'tiny', display_name: 'Tiny', description: '' }] });
    }
  }

  if (url === `${HELIX}/channels/followers`) {
    return ok({ total: params.broadcaster_id === 'u1' ? 4000 : 50 });
  }

  if (url === `${HELIX}/videos` && params.user_id === 'u1') {
    return ok({
      data: [
        {
          id: 't1',
          user_id: 'u1',
          user_name: 'Jo',
          title: 'Celeste any%',
          url: 'https://www.twitch.tv/videos/t1',
          created_at: '2024-06-09T00:00:00Z',
          view_count: 500,
        },
        {
          id: 't2',
          user_id: 'u1',
          user_name: 'Jo',
          title: 'Celeste practice',
          url: 'https://www.twitch.tv/videos/t2',
          created_at: '2024-06-05T00:00:00Z',
          view_count: 300,
        },
      ],
    });
  }

  return fail(404);
}

describe('Discovery Integration Tests', () => {
  describe('YouTubeCollector', () => {
    it('collects, filters and enriches channels', async () => {
      const { http } = createFakeHttp(youtubeRoute);
      const collector = new YouTubeCollector(settings, {
        http,
        logger: silentLogger,
        now: () => NOW,
        keywords: ['celeste'],
      });

      const result = await collector.collect();

      expect(result.platform).toBe('YouTube');
      expect(result.candidates).toBe(3);
      expect(result.filtered).toBe(2);
      expect(result.skipped).toBe(0);
      expect(result.records).toHaveLength(1);

      const record = result.records[0];
      expect(record?.username).toBe('Alpha');
      expect(record?.custom_url).toBe('@alpha');
      expect(record?.url).toBe('https://youtube.com/channel/UC_A');
      expect(record?.last_video_title).toBe('Celeste speedrun PB');
      expect(record?.last_video_url).toBe('https://youtube.com/watch?v=v1');
      expect(record?.followers).toBe(20000);
      expect(record?.country).toBe('US');
      expect(record?.emails).toEqual(['alpha@creator.test']);
      expect(record?.avg_views_per_video).toBe(2000);
      expect(record?.upload_frequency_days).toBe(4);
      expect(record?.engagement_rate).toBe('10.00%');
      expect(record?.indie_sentiment).toBe('positive');
      expect(record?.response_score).toBe(100);
      expect(record?.icebreaker).toBe(
        'Hi Alpha! Loved your recent Celeste content. Your 20.0K followers clearly appreciate your platformer gameplay!'
      );
    });

    it('sends the search window and gaming category', async () => {
      const { http, requests } = createFakeHttp(youtubeRoute);
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, now: () => NOW, keywords: ['celeste'] });

      await collector.searchVideos();

      expect(requests).toHaveLength(1);
      expect(requests[0]?.params).toEqual({
        part: 'snippet',
        q: 'celeste',
        type: 'video',
        videoCategoryId: '20',
        publishedAfter: '2024-05-11T00:00:00.000Z',
        maxResults: 50,
        key: 'test-key',
      });
    });

    it('serves repeated channel lookups from the cache', async () => {
      const { http, requests } = createFakeHttp(youtubeRoute);
      const cache = new ChannelCache<YouTubeChannel>();
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, cache });

      const first = await collector.getChannel('UC_A');
      const second = await collector.getChannel('UC_A');

      expect(second).toBe(first);
      expect(requests.filter((request) => request.url === `${YT}/channels`)).toHaveLength(1);
      expect(cache.size).toBe(1);
    });

    it('stops searching when the quota is exhausted', async () => {
      const { http, requests } = createFakeHttp((request) =>
        request.params.q === 'one' ? ok({ items: [] }) : googleError(403, 'quotaExceeded')
      );
      const logger = createTestLogger();
      const collector = new YouTubeCollector(settings, { http, logger, keywords: ['one', 'two', 'three'] });

      const hits = await collector.searchVideos();

      expect(hits).toEqual([]);
      expect(requests.map((request) => request.params.q)).toEqual(['one', 'two']);
      expect(logger.logs[0]).toBe(
        '[WARN] YouTube API quota exceeded, stopping search {"keyword":"two","reason":"quotaExceeded"}'
      );
    });

    it('fails the pass when the quota is exhausted before any search succeeds', async () => {
      const { http } = createFakeHttp(() => googleError(403, 'quotaExceeded'));
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one', 'two'] });

      await expect(collector.collect()).rejects.toThrow('Every YouTube search request failed');
    });

    it.each([
      [400, 'keyInvalid'],
      [403, 'accessNotConfigured'],
      [403, 'forbidden'],
    ] as const)('fails authentication on HTTP %d %s', async (status, reason) => {
      const { http, requests } = createFakeHttp(() => googleError(status, reason));
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one', 'two'] });

      await expect(collector.collect()).rejects.toThrow(`YouTube API key was rejected (${reason})`);
      expect(requests).toHaveLength(1);
    });

    it('skips a keyword whose search fails and continues', async () => {
      const { http, requests } = createFakeHttp((request) => (request.params.q === 'one' ? fail(500) : ok({ items: [] })));
      const metrics = createTestMetrics();
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, metrics, keywords: ['one', 'two'] });

      const hits = await collector.searchVideos();

      expect(hits).toEqual([]);
      expect(requests).toHaveLength(2);
      expect(metrics.records[0]).toEqual({
        type: 'increment',
        metric: 'discovery.request_failed',
        tags: { platform: 'YouTube' },
      });
    });

    it('fails authentication on a rejected key', async () => {
      const { http } = createFakeHttp(() => fail(401));
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one'] });

      await expect(collector.collect()).rejects.toThrow(DiscoveryAuthError);
    });

    it('fails the pass when every search request fails', async () => {
      const { http, requests } = createFakeHttp(() => fail(400));
      const collector = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one', 'two'] });

      await expect(collector.collect()).rejects.toThrow('Every YouTube search request failed');
      expect(requests).toHaveLength(2);
    });

    it('fails authentication without a key and makes no request', async () => {
      const { http, requests } = createFakeHttp(youtubeRoute);
      const collector = new YouTubeCollector({ ...settings, youtubeApiKey: null }, { http, logger: silentLogger });

      await expect(collector.collect()).rejects.toThrow('YOUTUBE_API_KEY is not configured');
      expect(requests).toHaveLength(0);
    });
  });

  describe('TwitchCollector', () => {
    it('collects recent streamers of the searched games', async () => {
      const { http } = createFakeHttp(twitchRoute);
      const collector = new TwitchCollector(settings, {
        http,
        logger: silentLogger,
        now: () => NOW,
        games: ['Celeste', 'Unknown Game'],
      });

      const result = await collector.collect();

      expect(result.candidates).toBe(2);
      expect(result.filtered).toBe(1);
      expect(result.skipped).toBe(0);
      expect(result.records).toHaveLength(1);

      const record = result.records[0];
      expect(record?.platform).toBe('Twitch');
      expect(record?.username).toBe('jo_plays');
      expect(record?.display_name).toBe('Jo');
      expect(record?.url).toBe('https://twitch.tv/jo_plays');
      expect(record?.followers).toBe(4000);
      expect(record?.total_views).toBe(12000);
      expect(record?.video_count).toBe(2);
      expect(record?.broadcaster_type).toBe('affiliate');
      expect(record?.last_game_played).toBe('Celeste');
      expect(record?.last_video_url).toBe('https://www.twitch.tv/videos/t1');
      expect(record?.social_links).toEqual({ discord: 'joplays' });
      expect(record?.avg_views_per_video).toBe(400);
      expect(record?.engagement_rate).toBe('10.00%');
      expect(record?.response_score).toBe(45);
      expect(record?.response_likelihood).toBe('Medium');
      expect(record?.icebreaker).toBe(
        'Hi Jo! Loved your recent Celeste content. Your 4.0K followers clearly appreciate your platformer gameplay!'
      );
    });

    it('authenticates helix requests with the app token', async () => {
      const { http, requests } = createFakeHttp(twitchRoute);
      const collector = new TwitchCollector(settings, { http, logger: silentLogger, now: () => NOW, games: ['Celeste'] });

      await collector.collect();

      const tokenRequest = requests[0];
      expect(tokenRequest?.method).toBe('post');
      expect(tokenRequest?.params).toEqual({
        client_id: 'test-client',
        client_secret: 'test-secret',
        grant_type: 'client_credentials',
      });

      const gamesRequest = requests[1];
      expect(gamesRequest?.url).toBe(`${HELIX}/games`);
      expect(gamesRequest?.headers.get('Client-ID')).toBe('test-client');
      expect(gamesRequest?.headers.get('Authorization')).toBe('Bearer test-token');
    });

    it('counts followers as zero when the follower lookup fails', async () => {
      const { http } = createFakeHttp((request) =>
        request.url === `${HELIX}/channels/followers` ? fail(500) : twitchRoute(request)
      );
      const collector = new TwitchCollector(settings, { http, logger: silentLogger });

      const user = await collector.getUser('u1');

      expect(user?.followers).toBe(0);
      expect(user?.login).toBe('jo_plays');
    });

    it('fails authentication when the token request is rejected', async () => {
      const { http } = createFakeHttp(() => fail(400));
      const collector = new TwitchCollector(settings, { http, logger: silentLogger });

      await expect(collector.collect()).rejects.toThrow(DiscoveryAuthError);
    });
  });

  describe('runDiscovery()', () => {
    it('keeps going when one platform cannot authenticate', async () => {
      const { http } = createFakeHttp(youtubeRoute);
      const youtube = new YouTubeCollector(settings, { http, logger: silentLogger, now: () => NOW, keywords: ['celeste'] });
      const twitch = new TwitchCollector({ ...settings, twitchClientId: null }, { http, logger: silentLogger });

      const run = await runDiscovery(settings, { logger: silentLogger, collectors: [youtube, twitch] });

      expect(run.records).toHaveLength(1);
      expect(run.platforms.map((platform) => platform.platform)).toEqual(['YouTube']);
      expect(run.platform_errors).toEqual([
        { platform: 'Twitch', code: 'AUTH_FAILED', message: 'TWITCH_CLIENT_ID is not configured' },
      ]);
      expect(run.summary.total).toBe(1);
      expect(run.summary.by_platform).toEqual({ YouTube: 1, Twitch: 0 });
    });
  });

  describe('runDiscovery() platform failures', () => {
    it('reports a rejected YouTube key as an authentication failure', async () => {
      const { http } = createFakeHttp(() => googleError(400, 'keyInvalid'));
      const youtube = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one'] });

      const run = await runDiscovery(settings, { logger: silentLogger, collectors: [youtube] });

      expect(run.records).toEqual([]);
      expect(run.platforms).toEqual([]);
      expect(run.platform_errors).toEqual([
        { platform: 'YouTube', code: 'AUTH_FAILED', message: 'YouTube API key was rejected (keyInvalid)' },
      ]);
    });

    it('reports a YouTube pass with no successful search as a discovery failure', async () => {
      const { http } = createFakeHttp(() => fail(400));
      const youtube = new YouTubeCollector(settings, { http, logger: silentLogger, keywords: ['one', 'two'] });

      const run = await runDiscovery(settings, { logger: silentLogger, collectors: [youtube] });

      expect(run.platform_errors).toEqual([
        { platform: 'YouTube', code: 'DISCOVERY_FAILED', message: 'Every YouTube search request failed' },
      ]);
    });
  });

  describe('summarizeDiscovery()', () => {
    it('counts contact channels, cadence and categories', () => {
      const summary = summarizeDiscovery([
        makeRecord({ upload_frequency_days: 2, upload_consistency: 'very_consistent' }),
        makeRecord({
          platform: 'Twitch',
          emails: [],
          email_count: 0,
          social_links: { instagram: 'jo', discord: 'jo' },
          upload_frequency_days: 5,
          indie_sentiment: 'neutral',
          response_likelihood: 'Low',
        }),
        makeRecord({ upload_frequency_days: 0, upload_consistency: 'unknown', social_links: {} }),
      ]);

      expect(summary).toEqual({
        total: 3,
        by_platform: { YouTube: 2, Twitch: 1 },
        with_email: 2,
        with_twitter: 1,
        with_instagram: 1,
        with_discord: 1,
        avg_upload_frequency_days: 3.5,
        very_active: 1,
        consistent_uploaders: 2,
        sentiment: { very_positive: 0, positive: 2, neutral: 1, negative: 0, very_negative: 0 },
        response_likelihood: { 'Very High': 2, High: 0, Medium: 0, Low: 1, 'Very Low': 0 },
      });
    });

    it('reports no average cadence without active creators', () => {
      expect(summarizeDiscovery([]).avg_upload_frequency_days).toBeNull();
    });
  });

  describe('selectPriorityList()', () => {
    const youtube = [30, 90, 60].map((score, i) =>
      makeRecord({ username: `yt${i}`, response_score: score })
    );
    const twitch = [40, 80].map((score, i) =>
      makeRecord({ platform: 'Twitch', username: `tw${i}`, response_score: score })
    );

    it('takes the top records per platform, YouTube first', () => {
      const list = selectPriorityList([...youtube, ...twitch], 2, 4);

      expect(list.map((record) => record.username)).toEqual(['yt1', 'yt2', 'tw1', 'tw0']);
    });

    it('fills spare places from the other platform', () => {
      const list = selectPriorityList([...youtube, twitch[1] ?? makeRecord()], 2, 4);

      expect(list.map((record) => record.username)).toEqual(['yt1', 'yt2', 'yt0', 'tw1']);
    });
  });

  describe('saveDiscoveryResults()', () => {
    it('writes the full export, backup and priority files', async () => {
      const store = new MemoryFileStore();
      const records = [makeRecord()];

      const paths = await saveDiscoveryResults(records, 'out', store, silentLogger);

      expect(paths).toEqual({
        allCsv: 'out/influencers_with_contacts.csv',
        backupJson: 'out/influencers_backup.json',
        priorityCsv: 'out/influencers_priority_top50.csv',
        priorityJson: 'out/influencers_priority_top50.json',
      });
      expect(JSON.parse(store.get('out/influencers_backup.json') ?? 'null')).toEqual(records);
      expect(JSON.parse(store.get('out/influencers_priority_top50.json') ?? 'null')).toEqual(records);
      expect(store.get('out/influencers_with_contacts.csv')?.split('\r\n')).toHaveLength(3);
    });
  });
});
