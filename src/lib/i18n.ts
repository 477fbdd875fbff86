import uiDictionary from "../../shared/i18n/ui.json";
import { createRoot, createSignal } from "solid-js";
import { isServer } from "solid-js/web";

type Dictionary = typeof uiDictionary;

export type Locale = keyof Dictionary;
export type TranslationKey = keyof Dictionary["en"];

const LOCALE_STORAGE_KEY = "section-nav-locale";

const isLocale = (value: string | null): value is Locale =>
	value !== null && Object.hasOwn(uiDictionary, value);

const safeStorage = () => {
	if (isServer || typeof window === "undefined") return null;
	return window.localStorage;
};

const readStoredLocale = (): Locale | null => {
	const value = safeStorage()?.getItem(LOCALE_STORAGE_KEY) ?? null;
	return isLocale(value) ? value : null;
};

const localeStore = createRoot(() => {
	const [locale, setLocaleInternal] = createSignal<Locale>(readStoredLocale() ?? "en");

	const setLocale = (nextLocale: Locale) => {
		setLocaleInternal(nextLocale);
		safeStorage()?.setItem(LOCALE_STORAGE_KEY, nextLocale);
	};

	return { locale, setLocale };
});

export const locale = localeStore.locale;
export const setLocale = localeStore.setLocale;

export const t = (key: TranslationKey): string => uiDictionary[locale()][key] ?? key;
