import type { FixedBand } from '../models/types.js';

export const AGE_BUCKET_BANDS: readonly FixedBand[] = [
  { lower: 0, upper: 18, label: '0-18' },
  { lower: 19, upper: 25, label: '19-25' },
  { lower: 26, upper: 35, label: '26-35' },
  { lower: 36, upper: 50, label: '36-50' },
  { lower: 51, upper: 65, label: '51-65' },
  { lower: 66, upper: 100, label: '65+' }
];

export const AGE_GROUP_BANDS: readonly FixedBand[] = [
  { lower: 0, upper: 4, label: 'Under 5' },
  { lower: 5, upper: 17, label: '5-17' },
  { lower: 18, upper: 24, label: '18-24' },
  { lower: 25, upper: 34, label: '25-34' },
  { lower: 35, upper: 44, label: '35-44' },
  { lower: 45, upper: 54, label: '45-54' },
  { lower: 55, upper: 64, label: '55-64' },
  { lower: 65, upper: 74, label: '65-74' },
  { lower: 75, upper: 120, label: '75+' }
];

export const INCOME_GROUP_BANDS: readonly FixedBand[] = [
  { lower: -10000000, upper: 0, label: 'Negative or Zero' },
  { lower: 1, upper: 9999, label: 'Under $10,000' },
  { lower: 10000, upper: 24999, label: '$10,000-$24,999' },
  { lower: 25000, upper: 49999, label: '$25,000-$49,999' },
  { lower: 50000, upper: 74999, label: '$50,000-$74,999' },
  { lower: 75000, upper: 99999, label: '$75,000-$99,999' },
  { lower: 100000, upper: 149999, label: '$100,000-$149,999' },
  { lower: 150000, upper: 10000000, label: '$150,000+' }
];

// 9999999 is the "not in universe" household income code; it has to match before the open top band.
export const HOUSEHOLD_INCOME_GROUP_BANDS: readonly FixedBand[] = [
  { lower: 9999999, upper: 9999999, label: 'N/A or Missing' },
  { lower: -10000000, upper: 0, label: 'Negative or Zero' },
  { lower: 1, upper: 24999, label: 'Under $25,000' },
  { lower: 25000, upper: 49999, label: '$25,000-$49,999' },
  { lower: 50000, upper: 74999, label: '$50,000-$74,999' },
  { lower: 75000, upper: 99999, label: '$75,000-$99,999' },
  { lower: 100000, upper: 149999, label: '$100,000-$149,999' },
  { lower: 150000, upper: 199999, label: '$150,000-$199,999' },
  { lower: 200000, upper: 10000000, label: '$200,000+' }
];
