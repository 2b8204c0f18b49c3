export { createServiceActivator, type ServiceActivator, type ServiceActivatorOptions } from "./service-activator.ts";
export { createRouter, type Router, type RouterOptions } from "./router.ts";
export { isMessageProducer, isMessageRouter, outputChannelOf } from "./introspection.ts";
