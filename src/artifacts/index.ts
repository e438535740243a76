export {
  ArtifactStore,
  ARTIFACT_CATEGORIES,
  type Artifact,
  type ArtifactCategory,
  type Clock,
} from './artifact-store';
export { dayStamp, fileStamp, minuteLabel, safeFileTitle, twoDigit } from './format';
