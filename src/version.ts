import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

export const UIDOCS_VERSION: string = pkg.version;
