export { sceneToElements } from './sceneToElements';
export { getDashboardStylesheet } from './services/StyleService';
