export { TagAdapter } from "./tag.js";
export { UserAdapter } from "./user.js";
export { NoteAdapter } from "./note.js";
export { RecordingAdapter } from "./recording.js";
export { ClipAdapter } from "./clip.js";
export { SoundEventAdapter } from "./sound-event.js";
export { SequenceAdapter } from "./sequence.js";
export { SoundEventAnnotationAdapter } from "./sound-event-annotation.js";
export { SequenceAnnotationAdapter } from "./sequence-annotation.js";
export { ClipAnnotationAdapter } from "./clip-annotation.js";
export { AnnotationTaskAdapter } from "./annotation-task.js";
export { SoundEventPredictionAdapter } from "./sound-event-prediction.js";
export { SequencePredictionAdapter } from "./sequence-prediction.js";
export { ClipPredictionAdapter } from "./clip-prediction.js";
export { MatchAdapter } from "./match.js";
export { ClipEvaluationAdapter } from "./clip-evaluation.js";
