declare namespace NodeJS {
  interface ProcessEnv {
    DEV_LOG?: string
    SURVEY_ID_COLUMN?: string
    SURVEY_ANON_LEVEL?: string
  }
}
