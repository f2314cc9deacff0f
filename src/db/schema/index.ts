export * from './customers'
export * from './products'
export * from './orders'
export * from './views'
export * from './relations'
