export { createMessage, createReply, createErrorMessage } from "./create.ts";
