export { getSql, closeDb } from './client.js';
export { loadSampleFamily, sampleChallengeWindow, sampleWorkoutWindow } from './sample.js';
