/**
 * Descriptor of the focused element.
 */
export interface ActiveElementSignal {
  tag: string;
  type: string | null;
  id: string | null;
}

/**
 * Shape of the document body.
 */
export interface BodyStructureSignal {
  childCount: number;
  classes: string;
}

/**
 * Fixed vector of UI signals hashed into a state signature.
 * Adding or removing a field changes every signature.
 */
export interface UiSignals {
  url: string;
  title: string;
  modalCount: number;
  overlayCount: number;
  activeElement: ActiveElementSignal | null;
  visibleForms: number;
  loadingCount: number;
  menuCount: number;
  bodyStructure: BodyStructureSignal | null;
}
