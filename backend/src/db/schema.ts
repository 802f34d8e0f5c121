export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS questions (
  id          BIGSERIAL PRIMARY KEY,
  question    TEXT NOT NULL,
  option_a    TEXT NOT NULL,
  option_b    TEXT NOT NULL,
  option_c    TEXT NOT NULL,
  option_d    TEXT NOT NULL,
  correct     TEXT NOT NULL,
  explanation TEXT NOT NULL DEFAULT '',
  created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS users (
  user_id    BIGINT PRIMARY KEY,
  username   TEXT,
  first_name TEXT,
  joined_at  TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS chats (
  chat_id  BIGINT PRIMARY KEY,
  type     TEXT NOT NULL,
  title    TEXT,
  added_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS admins (
  user_id  BIGINT PRIMARY KEY,
  added_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS stats (
  user_id            BIGINT PRIMARY KEY,
  attempted          INTEGER NOT NULL DEFAULT 0,
  correct            INTEGER NOT NULL DEFAULT 0,
  score              INTEGER NOT NULL DEFAULT 0,
  current_streak     INTEGER NOT NULL DEFAULT 0,
  max_streak         INTEGER NOT NULL DEFAULT 0,
  last_activity_date DATE,
  CHECK (correct <= attempted),
  CHECK (current_streak <= max_streak)
);
CREATE INDEX IF NOT EXISTS stats_score_idx ON stats (score DESC, user_id);

CREATE TABLE IF NOT EXISTS daily_stats (
  user_id   BIGINT NOT NULL,
  day       DATE NOT NULL,
  attempted INTEGER NOT NULL DEFAULT 0,
  correct   INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (user_id, day)
);

CREATE TABLE IF NOT EXISTS group_stats (
  chat_id   BIGINT NOT NULL,
  user_id   BIGINT NOT NULL,
  attempted INTEGER NOT NULL DEFAULT 0,
  correct   INTEGER NOT NULL DEFAULT 0,
  score     INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (chat_id, user_id)
);
CREATE INDEX IF NOT EXISTS group_stats_score_idx ON group_stats (chat_id, score DESC, user_id);

CREATE TABLE IF NOT EXISTS active_polls (
  poll_id           TEXT PRIMARY KEY,
  group_id          BIGINT,
  correct_option_id SMALLINT NOT NULL CHECK (correct_option_id BETWEEN 0 AND 3),
  created_at        TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS poll_answers (
  poll_id     TEXT NOT NULL,
  user_id     BIGINT NOT NULL,
  answered_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  PRIMARY KEY (poll_id, user_id)
);

CREATE TABLE IF NOT EXISTS compliments (
  id         BIGSERIAL PRIMARY KEY,
  kind       TEXT NOT NULL CHECK (kind IN ('correct', 'wrong')),
  text       TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS group_compliments (
  chat_id BIGINT NOT NULL,
  kind    TEXT NOT NULL CHECK (kind IN ('correct', 'wrong')),
  text    TEXT NOT NULL,
  PRIMARY KEY (chat_id, kind)
);

CREATE TABLE IF NOT EXISTS group_settings (
  chat_id             BIGINT PRIMARY KEY,
  compliments_enabled BOOLEAN NOT NULL DEFAULT TRUE
);

CREATE TABLE IF NOT EXISTS settings (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
