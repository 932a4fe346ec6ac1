import { normalizeSingleLine } from "./text";

const TRACKING_PARAM = /^(utm_[a-z]+|guccounter|guce_referrer|guce_referrer_sig|ncid|cmpid)$/i;

const toCanonicalLink = (link: string): string | null => {
  let parsed: URL;

  try {
    parsed = new URL(link.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }

  parsed.hash = "";
  for (const key of [...parsed.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) {
      parsed.searchParams.delete(key);
    }
  }

  const search = parsed.searchParams.toString();
  const pathname = parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, "") : parsed.pathname;
  return `${parsed.hostname.toLowerCase()}${pathname}${search ? `?${search}` : ""}`;
};

export const toArticleId = (link: string, title: string): string => {
  const canonical = toCanonicalLink(link);
  if (canonical) {
    return canonical;
  }

  const normalizedTitle = normalizeSingleLine(title).toLowerCase();
  const normalizedLink = normalizeSingleLine(link).toLowerCase();
  if (!normalizedTitle && !normalizedLink) {
    throw new Error("Cannot derive article id: both link and title are empty");
  }

  return `${normalizedTitle}|${normalizedLink}`;
};
