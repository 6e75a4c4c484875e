/**
 * Listing composer: fills text templates for reposting a flipped item.
 * Nothing here feeds the deal score.
 */

export const DESCRIPTION_STYLES = ['casual', 'viral hook', 'professional', 'quick sell'] as const;
export type DescriptionStyle = (typeof DESCRIPTION_STYLES)[number];

export interface DescriptionInput {
  style: string;
  title: string;
  price: number;
  condition: string;
  category: string;
  location: string;
}

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
});

export function formatPrice(price: number, fallback: string): string {
  return price > 0 ? usd.format(price) : fallback;
}

// First matching keyword set picks the blurb
const FEATURE_BLURBS: readonly { keywords: string[]; text: string }[] = [
  {
    keywords: ['ps5', 'playstation'],
    text:
      'PlayStation 5 console for 4K gaming, streaming and Blu-ray. ' +
      'Fast SSD loading and runs every current release.',
  },
  {
    keywords: ['xbox'],
    text: 'Xbox console for high-frame-rate gaming, Game Pass and 4K media.',
  },
  {
    keywords: ['laptop', 'notebook', 'macbook'],
    text: 'Dependable laptop for work, school and streaming, with enough headroom for light gaming.',
  },
];

export function featureBlurb(title: string, category: string, condition: string): string {
  const lower = title.toLowerCase();
  const match = FEATURE_BLURBS.find((b) => b.keywords.some((k) => lower.includes(k)));
  if (match) return match.text;
  return (
    `Solid ${category.toLowerCase()} item in ${condition.toLowerCase()} condition. ` +
    'Works for everyday use and is a sensible pickup at this price.'
  );
}

export function resolveStyle(style: string): DescriptionStyle {
  const lower = style.trim().toLowerCase();
  return DESCRIPTION_STYLES.find((s) => s === lower) ?? 'casual';
}

export function generateDescription(input: DescriptionInput): string {
  const title = input.title.trim() || 'This item';
  const price = formatPrice(input.price, 'a fair price');
  const condition = input.condition.trim() || 'Good';
  const category = input.category.trim() || 'General';
  const location = input.location.trim() ? `Located in ${input.location.trim()}. ` : '';
  const features = featureBlurb(title, category, condition);

  let lines: string[];
  switch (resolveStyle(input.style)) {
    case 'viral hook':
      lines = [
        `STOP SCROLLING: ${title} just listed in ${condition.toLowerCase()} condition.`,
        '',
        `Price: ${price}. ${location}First come, first served.`,
        '',
        features,
        '',
        'Why it is worth it:',
        '- Clean and ready to go',
        '- Priced to move',
        '- Great for daily use, gifts or upgrades',
        '',
        'If this post is still up, it is still available. Message today to claim it.',
      ];
      break;
    case 'professional':
      lines = [
        `${title} | ${condition} Condition`,
        '',
        `Offered at ${price}. ${location}`,
        features,
        '',
        'Details:',
        `- Condition: ${condition}`,
        `- Category: ${category}`,
        '- Tested and working unless noted otherwise.',
        '',
        'Local buyers preferred. Serious inquiries only.',
      ];
      break;
    case 'quick sell':
      lines = [
        `${title} for sale, ${condition.toLowerCase()} condition.`,
        '',
        `Price: ${price}. ${location}`,
        'Works as it should. Priced to sell fast.',
        '',
        'Pickup only. Cash or simple payment at meetup. First reasonable offer takes it.',
      ];
      break;
    case 'casual':
      lines = [
        `Selling my ${title.toLowerCase()}, in ${condition.toLowerCase()} condition.`,
        '',
        `Bought it for ${category.toLowerCase()} use and it has held up well. ` +
          'Clearing space, so it should go to someone who will use it.',
        '',
        `Asking ${price}. ${location}`,
        features,
        '',
        'Happy to answer questions or set up a time to look at it.',
      ];
      break;
  }

  return lines.join('\n');
}
