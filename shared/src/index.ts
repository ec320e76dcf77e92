export * from './schemas/contact.js';
export * from './schemas/content.js';
export * from './schemas/upload.js';
