export { configSchema, linkSchema, type Config, type LinkConfig } from './config-schema';
export { loadConfig, readConfigDocument, writeFile } from './files';
export { generateLinkRedirects } from './links';
export { loadRfdsFromRepo, parseRfdCsv, renderRfdIndex, type Rfd } from './rfds';
export { TEMPLATE_WARNING, renderGenerated } from './template';
