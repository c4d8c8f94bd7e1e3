export { PuppeteerRenderer, createPuppeteerRenderer, type PuppeteerRendererOptions } from './puppeteer-renderer.js';
