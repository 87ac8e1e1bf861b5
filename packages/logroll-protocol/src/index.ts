export {
  EnvelopeError,
  EnvelopeHeadSchema,
  WorkerMessageBodySchema,
  convert,
  decodeEnvelope,
  getEventType,
  type Envelope,
  type EnvelopeHead,
  type RawMessage,
  type WorkerMessageBody,
} from "./envelope.js";
