export * from './ProfileConfig';
export { buildClasspath } from './Classpath';
export { buildLaunchCommand, launch, LaunchOptions, LaunchCommand, SpawnFn } from './LaunchCommand';
