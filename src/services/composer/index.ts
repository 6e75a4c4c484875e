export { generateDescription, featureBlurb, formatPrice, resolveStyle, DESCRIPTION_STYLES } from './description.js';
export type { DescriptionInput, DescriptionStyle } from './description.js';
export { formatForPlatform, platformNotes, LISTING_PLATFORMS } from './platform-format.js';
export type { ListingPlatform, PlatformListingInput } from './platform-format.js';
export { cleanSellerText } from './seller-text.js';
export { saveListingPackage, safeListingName, listingBaseName } from './listing-files.js';
export type { ListingPackageInput, ListingPhoto, SavedListingPackage } from './listing-files.js';
