import { ServerlessS3Put } from './plugin';

module.exports = ServerlessS3Put;
