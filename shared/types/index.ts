// Shared types for running and rolling statistics

export * from './src';
