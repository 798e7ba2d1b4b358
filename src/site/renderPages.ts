/**
 * HTML templates for the directory index and the per-shop pages.
 * Every interpolated value goes through escapeHtml().
 */

import { formatCopy, type SiteCopy } from '../config/siteCopy.js';
import type { BusinessRecord } from '../types/Business.js';
import { escapeHtml } from '../utils/html.js';

export interface PageContext {
  copy: SiteCopy;
  /** Source file names shown in the footer */
  sourceNames: readonly string[];
}

export function renderRating(record: BusinessRecord, copy: SiteCopy): string {
  if (record.rating === undefined) {
    return copy.noRating;
  }
  const rating = `${record.rating.toFixed(1)} / 5`;
  return record.reviewCount === undefined
    ? rating
    : `${rating} ${formatCopy(copy.reviewCount, { count: record.reviewCount })}`;
}

export function storeHref(slug: string): string {
  return `./stores/${encodeURIComponent(slug)}/`;
}

export function listCategories(records: readonly BusinessRecord[]): string[] {
  const categories = new Set<string>();
  for (const record of records) {
    if (record.category) categories.add(record.category);
  }
  return [...categories].sort();
}

/** Only http(s) links from the scraped data are rendered */
export function isWebUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

function externalLink(href: string | undefined, label: string, className: string): string {
  if (!href || !isWebUrl(href)) return '';
  return `<a class="${className}" href="${escapeHtml(href)}" target="_blank" rel="noopener">${escapeHtml(label)}</a>`;
}

function sourceFooter(context: PageContext): string {
  return formatCopy(context.copy.sourceNote, { sources: context.sourceNames.join(', ') });
}

function renderCard(record: BusinessRecord, copy: SiteCopy): string {
  const mapLink = externalLink(record.mapLink, copy.openMap, 'btn secondary');
  const mapButton = mapLink ? `\n            ${mapLink}` : '';

  return `      <article class="card" data-card data-category="${escapeHtml(record.category ?? '')}" data-search="${escapeHtml(record.searchHaystack)}">
        <div class="card__body">
          <div class="chip">${escapeHtml(record.category ?? copy.defaultCategory)}</div>
          <h2 class="card__title">${escapeHtml(record.name)}</h2>
          <div class="meta">⭐ ${escapeHtml(renderRating(record, copy))}</div>
          <div class="meta">📍 ${escapeHtml(record.address ?? copy.addressMissing)}</div>
          <div class="cta">
            <a class="btn" href="${escapeHtml(storeHref(record.slug))}" aria-label="${escapeHtml(formatCopy(copy.viewShopLabel, { name: record.name }))}">${escapeHtml(copy.viewShop)}</a>${mapButton}
          </div>
        </div>
      </article>`;
}

export function renderIndexPage(records: readonly BusinessRecord[], context: PageContext): string {
  const { copy } = context;
  const options = [
    `<option value="">${escapeHtml(copy.allCategories)}</option>`,
    ...listCategories(records).map(
      (category) => `<option value="${escapeHtml(category)}">${escapeHtml(category)}</option>`
    ),
  ].join('');
  const cards = records.map((record) => renderCard(record, copy)).join('\n');

  return `<!doctype html>
<html lang="${escapeHtml(copy.lang)}">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(copy.title)}</title>
  <link rel="stylesheet" href="./assets/style.css" />
</head>
<body>
  <main class="page">
    <section class="hero">
      <h1>${escapeHtml(copy.title)}</h1>
      <p>${escapeHtml(copy.intro)}</p>
      <div class="controls">
        <label class="search">
          <span role="img" aria-label="${escapeHtml(copy.searchLabel)}">🔍</span>
          <input type="search" placeholder="${escapeHtml(copy.searchPlaceholder)}" data-search-input />
        </label>
        <label class="search">
          <span role="img" aria-label="${escapeHtml(copy.categoryLabel)}">🎯</span>
          <select data-category-filter>${options}</select>
        </label>
      </div>
    </section>
    <section class="card-grid">
${cards}
    </section>
    <p class="footer">${escapeHtml(formatCopy(copy.shopCount, { count: records.length }))} ${escapeHtml(sourceFooter(context))}</p>
  </main>
  <script src="./assets/script.js"></script>
</body>
</html>
`;
}

export function renderStorePage(record: BusinessRecord, context: PageContext): string {
  const { copy } = context;

  const actions = [
    externalLink(record.mapLink, copy.openMapLong, 'btn secondary'),
    externalLink(record.websiteUrl, copy.visitWebsite, 'btn'),
    record.phone
      ? `<a class="btn secondary" href="tel:${escapeHtml(record.phone)}">${escapeHtml(copy.callPhone)}</a>`
      : '',
  ]
    .filter(Boolean)
    .join('\n        ');

  const featureChips =
    record.features.length > 0
      ? record.features.map((feature) => `<span class="chip">${escapeHtml(feature)}</span>`).join('\n        ')
      : `<span class="chip">${escapeHtml(copy.defaultCategory)}</span>`;

  const infoItems = [
    `<li>📍 ${escapeHtml(copy.addressLabel)}: ${escapeHtml(record.address ?? copy.notProvided)}</li>`,
    `<li>⌚ ${escapeHtml(copy.statusLabel)}: ${escapeHtml(record.status ?? copy.statusMissing)}</li>`,
    `<li>🗓️ ${escapeHtml(copy.hoursLabel)}: ${escapeHtml(record.hours ?? copy.notProvided)}</li>`,
    record.phone ? `<li>☎️ ${escapeHtml(copy.phoneLabel)}: ${escapeHtml(record.phone)}</li>` : '',
  ]
    .filter(Boolean)
    .join('\n          ');

  const imageBlock = record.coverImageUrl
    ? `<div class="gallery"><img src="${escapeHtml(record.coverImageUrl)}" alt="${escapeHtml(formatCopy(copy.imageAlt, { name: record.name }))}" loading="lazy" /></div>`
    : `<div class="gallery placeholder">${escapeHtml(copy.noImage)}</div>`;

  return `<!doctype html>
<html lang="${escapeHtml(copy.lang)}">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(record.name)} | ${escapeHtml(copy.title)}</title>
  <link rel="stylesheet" href="../../assets/style.css" />
</head>
<body>
  <main class="page">
    <a class="back-link" href="../../index.html">${escapeHtml(copy.backToList)}</a>
    <section class="hero">
      <h1>${escapeHtml(record.name)}</h1>
      <p>${escapeHtml(record.category ?? copy.defaultCategory)}</p>
      <div class="tag-row">
        <span class="chip">⭐ ${escapeHtml(renderRating(record, copy))}</span>
        ${featureChips}
      </div>
      <div class="cta">
        ${actions}
      </div>
    </section>

    <div class="detail-grid">
      <div class="panel">
        <h2>${escapeHtml(copy.aboutHeading)}</h2>
        <ul class="list">
          ${infoItems}
        </ul>
      </div>
      <div class="panel">
        <h2>${escapeHtml(copy.photoHeading)}</h2>
        ${imageBlock}
      </div>
    </div>

    <div class="panel panel--spaced">
      <h2>${escapeHtml(copy.linksHeading)}</h2>
      <div class="cta">
        ${actions}
      </div>
    </div>

    <p class="footer">${escapeHtml(sourceFooter(context))} ${escapeHtml(copy.generatedNote)}</p>
  </main>
  <script src="../../assets/script.js"></script>
</body>
</html>
`;
}
