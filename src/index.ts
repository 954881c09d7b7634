/**
 * Creator Outreach - Main Entry Point
 *
 * Public interfaces for the gaming creator discovery and key outreach pipeline.
 *
 * Architecture:
 * - Discovery collects creators per platform and enriches each into an InfluencerRecord
 * - Text heuristics (extractor, classifier, sentiment, metrics, scoring, icebreaker) are pure
 * - The key ledger is the only durable state and is written before any email is drafted
 * - Modules communicate through records and files, never through shared state
 */

// Core Types
export type * from './types/index.js';

// Logger Module
export { createLogger, silentLogger, defaultMetrics, type Logger, type Metrics } from './logger/index.js';

// Config Module - Environment settings
export { loadConfig, outputPath, ConfigError, type AppConfig, type PathSettings } from './config/index.js';

// Storage Module - Text file persistence
export { FsFileStore, MemoryFileStore, createFileStore, type FileStore } from './storage/index.js';

// Extractor Module - Contact details in free text
export {
  extractEmails,
  extractSocialLinks,
  extractBusinessTerms,
  deobfuscateEmailText,
  isPlaceholderEmail,
} from './extractor/index.js';

// Classifier Module - Gaming channel detection
export { scoreChannelContent, isGamingChannel, type ClassificationScores } from './classifier/index.js';

// Sentiment Module - Attitude toward indie games
export { analyzeSentiment, categorizeSentiment } from './sentiment/index.js';

// Metrics Module - Upload cadence and engagement
export {
  calculateContentMetrics,
  calculateEngagementRate,
  classifyConsistency,
  uploadGapsInDays,
} from './metrics/index.js';

// Scoring Module - Response likelihood
export {
  calculateResponseLikelihood,
  categorizeResponseScore,
  countContactMethods,
  type ResponseSignals,
} from './scoring/index.js';

// Icebreaker Module
export {
  generateIcebreaker,
  formatFollowerCount,
  detectGameInTitle,
  type IcebreakerInput,
} from './icebreaker/index.js';

// Normalizer Module - Creator record validation
export { normalizeCreatorRecord, type RawCreatorRecord } from './normalizer/index.js';

// Enrichment Module
export { enrichCreator, buildBioSnippet } from './enrichment/index.js';

// Discovery Module - YouTube and Twitch collection
export {
  YouTubeCollector,
  TwitchCollector,
  ChannelCache,
  DiscoveryAuthError,
  runDiscovery,
  summarizeDiscovery,
  selectPriorityList,
  saveDiscoveryResults,
  DISCOVERY_OUTPUT_FILES,
  YOUTUBE_SEARCH_KEYWORDS,
  TWITCH_PLATFORMER_GAMES,
  type CollectorOptions,
  type CollectorResult,
  type DiscoveryCollector,
  type DiscoveryRun,
  type DiscoverySummary,
  type PlatformError,
  type RunDiscoveryOptions,
} from './discovery/index.js';

// Ledger Module - Key pool and assignments
export {
  MIN_KEY_LENGTH,
  LedgerCorruptError,
  parseKeyLedger,
  loadKeyAssignments,
  saveKeyAssignments,
  parseKeyPool,
  loadKeyPool,
  splitDelimitedLine,
  selectAvailableKeys,
  assignKeys,
  markSent,
  markResponded,
  findFollowUpCandidates,
  summarizeLedger,
  type OutreachTarget,
  type KeyAssignmentPlan,
  type LedgerUpdate,
  type FollowUpCandidate,
  type LedgerStats,
} from './ledger/index.js';

// Composer Module - Outreach and follow-up emails
export {
  composeOutreachEmail,
  composeFollowUpEmail,
  buildOpeningLine,
  selectFeatureAngle,
  selectSubjectAngle,
  type OutreachRecipient,
  type FollowUpRecipient,
  type ContentAngle,
} from './composer/index.js';

// Renderers Module - CSV and text reports
export {
  INFLUENCER_CSV_COLUMNS,
  renderInfluencerCsv,
  toCsvRow,
  escapeCsvField,
  renderDraftReport,
  renderFollowUpReport,
  renderCampaignStats,
  type InfluencerCsvColumn,
  type ReportEntry,
  type CampaignStats,
} from './renderers/index.js';

// Adapters Module - Mail drafts
export {
  GmailDraftAdapter,
  createGmailAdapterFromFiles,
  loadGmailAuth,
  buildRawMessage,
  encodeRawMessage,
  encodeHeaderValue,
  GMAIL_COMPOSE_SCOPE,
  type DraftAdapter,
  type DraftResult,
  type GmailDraftsApi,
  type GmailOAuthClient,
} from './adapters/index.js';

// Campaign Module - Key distribution runs
export {
  generateCampaign,
  generateFollowUps,
  markSentAndSave,
  markRespondedAndSave,
  campaignStats,
  loadInfluencerRecords,
  primaryAddress,
  DRAFT_REPORT_FILE,
  FOLLOW_UP_REPORT_FILE,
  DEFAULT_FOLLOW_UP_DAYS,
  type CampaignIO,
  type CampaignOptions,
  type CampaignOutcome,
  type FollowUpOptions,
  type FollowUpOutcome,
  type StatsOptions,
} from './campaign/index.js';
