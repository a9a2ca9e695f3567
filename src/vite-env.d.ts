/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_RENDER_TIME_STEP?: string;
  readonly VITE_MAP_TOLERANCE?: string;
  readonly VITE_MAP_CORNER_RADIUS?: string;
  readonly VITE_UNIT_TOLERANCE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
