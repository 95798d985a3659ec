/**
 * Marketplace CSS Selectors
 *
 * Listing pages render one `.offer` element per ad card; paid placements
 * carry the extra `.promoted` class. Detail pages expose their fields through
 * `data-cy` / `data-testid` attributes inside the block that follows the
 * site header.
 */

export const LISTING_SELECTORS = {
  card: '.offer',
  promotedClass: 'promoted',

  link: 'a[href]',
  title: '.title-cell strong',
  price: '.price strong',
  // The location text sits in the parent of the pin icon
  locationIcon: 'i[data-icon="location-filled"]',
  kind: '[data-testid="ad-kind"]',

  // The next page link is in the first span after the current page's span
  currentPage: 'span[data-cy="page-link-current"]',
} as const

export const DETAIL_SELECTORS = {
  // Missing container means the page is not an ad page
  content: 'header ~ div',

  title: 'h1[data-cy="ad_title"]',
  description: 'div[data-cy="ad_description"] > div',
  price: 'div[data-testid="ad-price-container"] > h3',
  author: 'a[name="user_ads"] > div > div > h2',
  profile: 'a[name="user_ads"]',
  // Static map image; its alt text is the ad location
  location: '.qa-static-ad-map-container > img',
  kind: '[data-testid="ad-kind"]',
} as const
