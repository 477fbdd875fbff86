import { createSignal } from "solid-js";
import { errorMessage } from "./errors";
import { type SectionSource, sectionApi } from "./section-api";
import type { Section } from "./types";

/**
 * Creates a reactive section store.
 * Holds the latest section list fetched from the content backend.
 */
export function createSectionStore(source: SectionSource = sectionApi) {
	const [sections, setSections] = createSignal<Section[]>([]);
	const [loading, setLoading] = createSignal(false);
	const [error, setError] = createSignal<string | null>(null);
	const [initialized, setInitialized] = createSignal(false);

	let pending: Promise<Section[]> | null = null;

	/** Fetch sections and replace the stored list; concurrent callers share one request */
	function loadSections(): Promise<Section[]> {
		if (!pending) {
			pending = fetchSections().finally(() => {
				pending = null;
			});
		}
		return pending;
	}

	async function fetchSections(): Promise<Section[]> {
		setLoading(true);
		setError(null);
		try {
			const fetched = await source.list();
			setSections(fetched);
			setInitialized(true);
			return fetched;
		} catch (e) {
			const message = errorMessage(e, "Failed to load sections");
			// biome-ignore lint/suspicious/noConsole: surface backend failures
			console.error("[section-nav] Failed to load sections:", message);
			setError(message);
			throw e;
		} finally {
			setLoading(false);
		}
	}

	function clear(): void {
		setSections([]);
		setError(null);
		setInitialized(false);
	}

	return {
		// Reactive getters
		sections,
		loading,
		error,
		initialized,

		// Actions
		loadSections,
		clear,
	};
}

export type SectionStore = ReturnType<typeof createSectionStore>;
