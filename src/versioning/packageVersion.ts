// Name and version stamped into generated CSL item notes.
import pkg from '../../package.json';

export const PACKAGE_NAME: string = pkg.name;
export const PACKAGE_VERSION: string = pkg.version;
