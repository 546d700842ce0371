export const config = {
  dbPath: process.env.DB_PATH || "data/jams.db",
  keywordsPath: process.env.KEYWORDS_PATH || "keywords.json",
  crawlDelayMs: parseInt(process.env.CRAWL_DELAY_MS || "1000", 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "15000", 10),
  baseUrl: process.env.ITCH_BASE_URL || "https://itch.io",
  userAgent: process.env.CRAWLER_USER_AGENT || "jam-crawler/0.9.0",
};
