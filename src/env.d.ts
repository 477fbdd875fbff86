/// <reference types="vite/client" />

interface ImportMetaEnv {
	readonly VITE_SECTIONS_API_BASE?: string;
}
