export { AvatarBuildEndpoint } from './AvatarBuildEndpoint';
export { AvatarGenerateEndpoint } from './AvatarGenerateEndpoint';
export { ImageGenerateEndpoint } from './ImageGenerateEndpoint';
export { VideoGenerateEndpoint } from './VideoGenerateEndpoint';
export { VoiceCloneEndpoint } from './VoiceCloneEndpoint';
