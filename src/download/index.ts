/**
 * Download System - Main Entry Point
 */

export * from './core';
export { HttpClient, HttpClientOptions, NodeFetchHttpClient } from './HttpClient';
export { ContentStore, ContentStoreOptions, PutOutcome } from '../storage/ContentStore';
