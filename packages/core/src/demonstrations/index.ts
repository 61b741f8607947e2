/**
 * Demonstrations
 *
 * Every pattern demonstration shipped with the catalog.
 *
 * @module demonstrations
 */

import type { PatternDemonstration } from '../catalog/types.js';

import { chainOfResponsibility } from './behavioral/chain-of-responsibility.js';
import { command } from './behavioral/command.js';
import { iterator } from './behavioral/iterator.js';
import { mediator } from './behavioral/mediator.js';
import { memento } from './behavioral/memento.js';
import { observer } from './behavioral/observer.js';
import { state } from './behavioral/state.js';
import { strategy } from './behavioral/strategy.js';
import { templateMethod } from './behavioral/template-method.js';
import { visitor } from './behavioral/visitor.js';

import { abstractFactory } from './creational/abstract-factory.js';
import { builder } from './creational/builder.js';
import { factoryMethod } from './creational/factory-method.js';
import { prototype } from './creational/prototype.js';
import { singleton } from './creational/singleton.js';

import { adapter } from './structural/adapter.js';
import { bridge } from './structural/bridge.js';
import { composite } from './structural/composite.js';
import { decorator } from './structural/decorator.js';
import { facade } from './structural/facade.js';
import { flyweight } from './structural/flyweight.js';
import { proxy } from './structural/proxy.js';

export const ALL_DEMONSTRATIONS: readonly PatternDemonstration[] = [
  chainOfResponsibility,
  command,
  iterator,
  mediator,
  memento,
  observer,
  state,
  strategy,
  templateMethod,
  visitor,
  abstractFactory,
  builder,
  factoryMethod,
  prototype,
  singleton,
  adapter,
  bridge,
  composite,
  decorator,
  facade,
  flyweight,
  proxy,
];

// Building blocks, for callers that want the pattern objects themselves
export { handleRequest, DEFAULT_CHAIN, type Handler, type HandlerRole } from './behavioral/chain-of-responsibility.js';
export { Light, RemoteControl, type LightCommand } from './behavioral/command.js';
export { BookCollection } from './behavioral/iterator.js';
export { ChatRoom } from './behavioral/mediator.js';
export { Editor, type EditorSnapshot, type EditorOperation } from './behavioral/memento.js';
export { Publisher, namedSubscriber, DEFAULT_SUBSCRIBERS, type Subscriber } from './behavioral/observer.js';
export {
  Order,
  transitionOrder,
  describeStatus,
  INITIAL_ORDER_STATUS,
  type OrderStatus,
  type OrderTransition,
  type TransitionResult,
} from './behavioral/state.js';
export { Checkout, PAYMENT_STRATEGIES, type PaymentMethod, type PaymentStrategy } from './behavioral/strategy.js';
export { DataProcessor, CsvProcessor, JsonProcessor } from './behavioral/template-method.js';
export { visitShape, areaVisitor, type Shape, type ShapeVisitor } from './behavioral/visitor.js';
export { MAX_ACCESSES } from './creational/singleton.js';
export { createWidgetFactory, renderForm, type Platform, type Widget, type WidgetFactory } from './creational/abstract-factory.js';
export { ComputerBuilder, describeComputer, type Computer } from './creational/builder.js';
export {
  Logistics,
  RoadLogistics,
  SeaLogistics,
  logisticsFor,
  ROUTES,
  type Route,
  type Transport,
} from './creational/factory-method.js';
export { DocumentPrototype, type DocumentFields } from './creational/prototype.js';
export { LegacyPrinter, LegacyPrinterAdapter, type Printer } from './structural/adapter.js';
export { BridgedShape, RENDERERS, type Renderer } from './structural/bridge.js';
export { renderTree, treeDepth, MAX_TREE_DEPTH, type FileNode } from './structural/composite.js';
export { Coffee, AddOnDecorator, formatCents, type AddOn, type Beverage } from './structural/decorator.js';
export { HomeTheaterFacade } from './structural/facade.js';
export { TreeTypeFactory, drawTree, type TreeType } from './structural/flyweight.js';
export { ImageProxy, RealImage, type Image } from './structural/proxy.js';
