/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_USER_LOOKUP_DELAY_MS?: string
  readonly VITE_LOG_LEVEL?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
