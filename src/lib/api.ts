const DEFAULT_BACKEND_BASE = "/api";

export const getBackendBase = (): string => {
	// Relative by default so that the host app can proxy the content backend.
	const configured = import.meta.env.VITE_SECTIONS_API_BASE;
	if (typeof configured === "string" && configured.trim()) {
		return configured.trim();
	}
	return DEFAULT_BACKEND_BASE;
};

export const joinUrl = (base: string, path = "/"): string => {
	if (!base) return path;
	const b = base.replace(/\/$/, "");
	const p = path.replace(/^\//, "");
	return `${b}/${p}`;
};

export const apiFetch = async (path = "/", options?: RequestInit) => {
	const url = joinUrl(getBackendBase(), path);
	// biome-ignore lint/suspicious/noConsole: request trace
	console.log(`apiFetch: ${url}`);
	return fetch(url, options);
};
