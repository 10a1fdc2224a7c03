/**
 * Boilerplate patterns shared by document cleaning (normalizer) and snippet
 * selection (search). English and Spanish outlets.
 */

const BOILERPLATE_SOURCES = [
  // cookies / privacy
  String.raw`\b(?:aceptar|accept)(?:\s+all)?\s+cookies\b`,
  String.raw`\bpol[ií]tica\s+de\s+cookies\b`,
  String.raw`\bcookie\s?(?:policy|settings|preferences)\b`,
  String.raw`\bthis\s+(?:site|website)\s+uses\s+cookies\b`,
  String.raw`\beste\s+sitio\s+usa\s+cookies\b`,
  String.raw`\bprivacy\s+policy\b`,
  String.raw`\bal\s+continuar\s+navegando\b`,
  String.raw`\bconfigura\s+tus\s+preferencias\b`,

  // login / subscription / paywall
  String.raw`\bsubscribe\b`,
  String.raw`\bsign\s+up\b`,
  String.raw`\blog\s?in\s+to\s+continue\b`,
  String.raw`\bsuscr[ií]bete\b`,
  String.raw`\breg[ií]strate\b`,
  String.raw`\binicia\s+sesi[oó]n\b`,
  String.raw`\bplanes?\s+de\s+suscripci[oó]n\b`,
  String.raw`\bnewsletters?\b`,
  String.raw`\bboletines?\b`,

  // promos / CTAs
  String.raw`\bclick\s+here\b`,
  String.raw`\bhaz\s+clic\s+aqu[ií]\b`,
  String.raw`\bread\s+more\b`,
  String.raw`\bcontin[uú]a\s+leyendo\b`,
  String.raw`\bver\s+m[aá]s\b`,
  String.raw`\blee\s+tambi[eé]n\b`,
  String.raw`\badvertisement\b`,
  String.raw`\bpublicidad\b`,

  // social widgets
  String.raw`\bshare\s+(?:this|on)\b`,
  String.raw`\bfollow\s+us\s+on\b`,
  String.raw`\bs[ií]guenos\s+en\b`,
];

/** Global regex: use `countBoilerplate` rather than `.test` to avoid lastIndex state */
const RE_BOILERPLATE = new RegExp(BOILERPLATE_SOURCES.join('|'), 'gi');

/** Single-match variant, safe to call repeatedly */
export const BOILERPLATE = new RegExp(BOILERPLATE_SOURCES.join('|'), 'i');

/** Lines that are navigation chrome on their own */
export const NAVIGATION_LINE = /^(?:menu|home|inicio|search|buscar|share|compartir|skip to (?:main )?content|back to top|next|previous|siguiente|anterior|more|m[aá]s)$/i;

/** Lighter filter for UI-facing snippets */
export const SNIPPET_NOISE = new RegExp(
  [
    String.raw`suscripci[oó]n`,
    String.raw`subscri(?:be|ption)`,
    String.raw`inicia\s+sesi[oó]n`,
    String.raw`cookies?`,
    String.raw`privacy\s+policy`,
    String.raw`newsletter`,
    String.raw`click\s+here`,
    String.raw`haz\s+clic`,
    String.raw`contin[uú]a\s+leyendo`,
    String.raw`ver\s+m[aá]s`,
    String.raw`publicidad`,
    String.raw`advertisement`,
  ].join('|'),
  'i'
);

export const URL_PATTERN = /https?:\/\/\S+|www\.\S+/gi;

export function countBoilerplate(text: string): number {
  return text.match(RE_BOILERPLATE)?.length ?? 0;
}

export function countUrls(text: string): number {
  return text.match(URL_PATTERN)?.length ?? 0;
}
