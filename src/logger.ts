import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('catalog-gateway');

export default LibLogger;
