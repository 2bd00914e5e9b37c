/// <reference types="vite/client" />

// Global build-mode flag for dead code elimination
declare const __DEV__: boolean;
