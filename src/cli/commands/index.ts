// Command registration exports

export { registerApplyCommand } from './apply.js';
export { registerArchiveCommand } from './archive.js';
export { registerInitCommand } from './init.js';
export { registerListCommand } from './list.js';
export { registerProposeCommand } from './propose.js';
export { registerShowCommand } from './show.js';
export { registerValidateCommand } from './validate.js';
