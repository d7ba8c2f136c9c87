/**
 * Configuration Module
 *
 * Catalog, runtime settings and campaign file loading.
 */

export {
  DEFAULT_CATALOG_FILES,
  createCatalog,
  loadCatalog,
  resolveArgSpec,
  selectAxes,
} from './catalog.js';

export { type Settings, RESULTS_DIR_NAME, loadSettings, requireSourceRoot } from './settings.js';

export { type CampaignFile, CampaignFileLoader, campaignSelection } from './campaign-file.js';
