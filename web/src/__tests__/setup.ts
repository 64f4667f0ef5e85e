// Lets react's act() flush updates outside a full test renderer
Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true })
