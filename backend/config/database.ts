/**
 * Database configuration and connection
 * Reconnects with exponential backoff when the connection drops
 */
import mongoose, { type ConnectOptions } from 'mongoose';
import { getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';
import config from './env';

// Connection state tracking
let isConnecting = false;
let isClosing = false;
let reconnectAttempts = 0;
const MAX_RECONNECT_ATTEMPTS = 10;
const BASE_RECONNECT_DELAY_MS = 1000;
const MAX_RECONNECT_DELAY_MS = 60000;
let reconnectTimer: NodeJS.Timeout | null = null;

// MongoDB connection options
const mongoOptions: ConnectOptions = {
  // Connection pool settings; each connection holds ~1-2MB
  maxPoolSize: config.isProduction ? 50 : 10,
  minPoolSize: config.isProduction ? 5 : 1,  // Warm pool in production to reduce connection churn

  // Timeout settings
  serverSelectionTimeoutMS: 30000,
  socketTimeoutMS: 60000,            // Listing queries with regex filters can be slow
  connectTimeoutMS: 30000,

  // Heartbeat and monitoring
  heartbeatFrequencyMS: 10000,       // Check connection every 10s

  // Retry settings
  retryWrites: true,
  retryReads: true
};

// Acknowledged by a majority before a submission counts as stored
if (config.isProduction) {
  mongoOptions.w = 'majority';
}

// Global mongoose settings
// Indexes (unique submissionId, unique like per requester) are built outside production deploys
mongoose.set('autoIndex', !config.isProduction);

/**
 * Calculate exponential backoff delay with ±10% jitter
 */
function getReconnectDelay(): number {
  const delay = Math.min(
    BASE_RECONNECT_DELAY_MS * Math.pow(2, reconnectAttempts),
    MAX_RECONNECT_DELAY_MS
  );
  // Add jitter
  const jitter = delay * 0.2 * (Math.random() - 0.5);
  return Math.round(delay + jitter);
}

/**
 * Schedule a reconnection attempt
 */
function scheduleReconnect(): void {
  if (reconnectTimer) {
    clearTimeout(reconnectTimer);
  }
  if (isClosing || reconnectAttempts >= MAX_RECONNECT_ATTEMPTS) {
    if (!isClosing) {
      logger.error('Max reconnection attempts reached. Manual intervention required.', {
        attempts: reconnectAttempts
      });
    }
    return;
  }

  const delay = getReconnectDelay();
  reconnectTimer = setTimeout(() => {
    reconnectAttempts++;
    void connectDatabase();
  }, delay);
}

/**
 * Connect to MongoDB
 */
export async function connectDatabase(): Promise<boolean> {
  const uri = config.MONGODB_URI;
  if (!uri) {
    logger.error('MONGODB_URI not provided');
    return false;
  }

  // If already connected, return true
  if (mongoose.connection.readyState === 1) {
    logger.debug('MongoDB already connected');
    return true;
  }

  if (isConnecting) {
    logger.debug('Connection already in progress');
    return false;
  }

  isConnecting = true;
  try {
    logger.info('Connecting to MongoDB...', { attempt: reconnectAttempts });
    await mongoose.connect(uri, mongoOptions);
    logger.info('MongoDB connected successfully');
    reconnectAttempts = 0; // Reset on successful connection
    return true;
  } catch (error) {
    logger.error('MongoDB connection failed', { error: getErrorMessage(error) });
    // Keep serving and retry; submissions fail with a storage error meanwhile
    scheduleReconnect();
    return false;
  } finally {
    isConnecting = false;
  }
}

// Connection event handlers with automatic reconnection
mongoose.connection.on('error', (err: Error) => {
  logger.error('MongoDB connection error', { error: err.message });
  // The disconnect event handles reconnection
});

mongoose.connection.on('disconnected', () => {
  // Only attempt reconnect if we're not shutting down
  if (isClosing) return;
  logger.warn('MongoDB disconnected, scheduling reconnection');
  scheduleReconnect();
});

/**
 * Close database connection gracefully
 */
export async function closeDatabase(): Promise<void> {
  isClosing = true;

  // Clear reconnection timer
  if (reconnectTimer) {
    clearTimeout(reconnectTimer);
    reconnectTimer = null;
  }

  if (mongoose.connection.readyState === 1) {
    await mongoose.connection.close();
    logger.info('MongoDB connection closed');
  }
}

export default { connectDatabase, closeDatabase };
