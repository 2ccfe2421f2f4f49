export { buildEmbed, publishBroadcast, connectAndPublish } from './post-publisher';
