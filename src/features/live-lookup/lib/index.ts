export { lookupLiveBroadcast } from './live-detector';
