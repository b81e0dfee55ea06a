/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SYNOPTIC_TOKEN?: string;
  readonly VITE_FEEDBACK_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
