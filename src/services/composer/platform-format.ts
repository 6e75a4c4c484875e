import { formatPrice } from './description.js';

export const LISTING_PLATFORMS = ['facebook', 'craigslist', 'offerup'] as const;
export type ListingPlatform = (typeof LISTING_PLATFORMS)[number];

export interface PlatformListingInput {
  platform: string;
  title: string;
  price: number;
  condition: string;
  category: string;
  location: string;
  description: string;
  localOnly: boolean;
}

interface PlatformTerms {
  name: string;
  localOnly: string[];
  shipping: string[];
  /** Lines added either way */
  always: string[];
}

const PLATFORM_TERMS: Record<ListingPlatform, PlatformTerms> = {
  facebook: {
    name: 'Facebook Marketplace',
    localOnly: ['Pickup: Local pickup only. No shipping.'],
    shipping: ['Pickup/Shipping: Local pickup preferred. Shipping may be available.'],
    always: ['Payments: Cash, Venmo, or as agreed on pickup.'],
  },
  craigslist: {
    name: 'Craigslist',
    localOnly: ['Terms: Local cash sale only. No shipping.'],
    shipping: ['Terms: Local sale preferred. Shipping possible if buyer pays in advance.'],
    always: [],
  },
  offerup: {
    name: 'OfferUp',
    localOnly: ['Pickup: Local meetup in a public place. No shipping.'],
    shipping: ['Pickup/Shipping: Local meetup or app-enabled shipping.'],
    always: [],
  },
};

export function platformNotes(platform: string, localOnly: boolean): string[] {
  const key = LISTING_PLATFORMS.find((p) => p === platform.trim().toLowerCase());
  if (!key) return [`Platform: ${platform.trim()}`];

  const terms = PLATFORM_TERMS[key];
  return [`Platform: ${terms.name}`, ...(localOnly ? terms.localOnly : terms.shipping), ...terms.always];
}

/** Header fields, optional description block, then the site's pickup and payment terms. */
export function formatForPlatform(input: PlatformListingInput): string {
  const lines = [
    `Title: ${input.title.trim() || 'Item for sale'}`,
    `Price: ${formatPrice(input.price, 'Best offer')}`,
    `Condition: ${input.condition.trim() || 'Good'}`,
  ];
  if (input.category.trim()) lines.push(`Category: ${input.category.trim()}`);
  if (input.location.trim()) lines.push(`Location: ${input.location.trim()}`);
  lines.push('');

  if (input.description.trim()) {
    lines.push('Description:', input.description.trim(), '');
  }

  lines.push(...platformNotes(input.platform, input.localOnly));
  return lines.join('\n');
}
