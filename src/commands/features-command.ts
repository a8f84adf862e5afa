/**
 * Features Command
 *
 * mockcraft features: lists the feature registry by category.
 */

import { FEATURE_CATEGORIES, FEATURES } from '../features';
import { color, dim, initUI, sectionHeader } from '../utils/ui';

export async function handleFeaturesCommand(): Promise<void> {
  await initUI();

  for (const category of FEATURE_CATEGORIES) {
    console.log(sectionHeader(category.label));
    const width = Math.max(...category.features.map((key) => key.length));
    for (const key of category.features) {
      const feature = FEATURES[key];
      console.log(`  ${color(key.padEnd(width + 2), 'command')} ${feature.label} ${dim(`- ${feature.description}`)}`);
    }
  }
  console.log('');
  console.log(dim('Use in a blueprint entry: features: [{ key: delays, options: { mode: fixed, value: 250 } }]'));
}
