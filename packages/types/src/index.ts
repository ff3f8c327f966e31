/**
 * @testpattern/types
 *
 * Shared type definitions for the test pattern renderer.
 * This package contains no logic: only TypeScript interfaces and types
 * that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Axis, Depth, Rect, Rgb } from './common';

// Descriptor wire format
export type {
  BackgroundKey,
  CellSpec,
  ChildDescriptor,
  ColorValue,
  GratingSpec,
  GridSpec,
  PairSpec,
  PatchDescriptor,
  PatchFields,
  RampSpec,
  RootDescriptor,
} from './descriptor';

// Validated model
export type {
  Background,
  CellSizing,
  DeclaredLength,
  GradientBackground,
  GratingBackground,
  GridAxisDefinition,
  NoBackground,
  OverlayRef,
  PatchNode,
  Placement,
  SolidBackground,
  TestPatternDocument,
  Waveform,
} from './model';

// Resolved geometry
export type { AxisGrid, CellSpan, ResolvedPatch } from './geometry';

// Pixels and overlays
export type { OverlayImage, OverlayLoader, PixelBuffer, SampleArray } from './pixels';

// Events
export type { EventBus, EventCallback, EventMap } from './events';

// Logging
export type { Logger, LogLevel } from './logger';
